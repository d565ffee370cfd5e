/**
 * Core error handling types and configuration
 */

import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics } from '@aws-lambda-powertools/metrics';

/**
 * Configuration for error handling
 */
export interface ErrorHandlingConfig {
  logger: Logger;
  metrics?: Metrics;
  operation: string; // Name of the operation for logging and metrics
  context?: Record<string, unknown>; // Additional context for logging
  metricPrefix?: string; // Prefix for metrics (default: operation name)
}

/**
 * Result of an operation with error handling
 */
export type ErrorHandlingResult<TSuccess = unknown, TError = unknown> =
  | {
      success: true;
      data: TSuccess;
      duration: number;
    }
  | {
      success: false;
      error: TError;
      duration: number;
    };
