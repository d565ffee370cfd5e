/**
 * Base configuration and utilities for the SNS wrapper
 * Provides common error handling and metrics patterns
 */

import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics } from '@aws-lambda-powertools/metrics';
import { executeWithErrorHandlingThrow } from '../utils/error-handling/core';

/**
 * Base configuration shared by the HTTP client and the wrapper
 */
export interface AwsWrapperConfig {
  logger: Logger;
  metrics?: Metrics;
  context?: Record<string, unknown>;
}

/**
 * Create a standardized operation executor with logging and metrics.
 * Failures are rethrown unchanged after being logged.
 */
export function createAwsOperationExecutor(servicePrefix: string, config: AwsWrapperConfig) {
  return function executeOperation<T>(
    operation: () => Promise<T>,
    operationName: string,
    additionalContext?: Record<string, unknown>
  ): Promise<T> {
    return executeWithErrorHandlingThrow(operation, {
      logger: config.logger,
      metrics: config.metrics,
      operation: `${servicePrefix}${operationName}`,
      context: {
        ...config.context,
        ...additionalContext,
      },
      metricPrefix: `${servicePrefix}${operationName}`,
    });
  };
}
