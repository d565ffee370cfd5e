/**
 * Core error handling functions with standardized logging and metrics
 */

import { MetricUnit } from '@aws-lambda-powertools/metrics';
import { describeError } from './errors';
import { ErrorHandlingConfig, ErrorHandlingResult } from './types';

/**
 * Execute an operation with standardized error handling, logging, and metrics
 * @param operation The async operation to execute
 * @param config Error handling configuration
 * @returns Operation result with success/error information
 */
export async function executeWithErrorHandling<TResult>(
  operation: () => Promise<TResult>,
  config: ErrorHandlingConfig
): Promise<ErrorHandlingResult<TResult>> {
  const startTime = Date.now();
  const { logger, metrics, operation: operationName, context = {}, metricPrefix } = config;

  try {
    logger.debug(`Starting ${operationName}`, context);

    const result = await operation();
    const duration = Date.now() - startTime;

    if (metrics) {
      const prefix = metricPrefix || operationName;
      metrics.addMetric(`${prefix}Success`, MetricUnit.Count, 1);
      metrics.addMetric(`${prefix}Duration`, MetricUnit.Milliseconds, duration);
    }

    logger.debug(`${operationName} completed successfully`, {
      ...context,
      duration,
      result: truncateForLogging(result),
    });

    return {
      success: true,
      data: result,
      duration,
    };
  } catch (error) {
    const duration = Date.now() - startTime;

    if (metrics) {
      const prefix = metricPrefix || operationName;
      metrics.addMetric(`${prefix}Error`, MetricUnit.Count, 1);
      metrics.addMetric(`${prefix}ErrorDuration`, MetricUnit.Milliseconds, duration);
    }

    logger.error(`${operationName} failed`, {
      ...describeError(error),
      ...context,
      duration,
    });

    return {
      success: false,
      error,
      duration,
    };
  }
}

/**
 * Execute an operation with error handling that throws on failure.
 * The original error is rethrown untouched.
 */
export async function executeWithErrorHandlingThrow<TResult>(
  operation: () => Promise<TResult>,
  config: ErrorHandlingConfig
): Promise<TResult> {
  const result = await executeWithErrorHandling(operation, config);

  if (!result.success) {
    throw result.error;
  }

  return result.data;
}

/**
 * Truncate result for logging to prevent large log entries
 * If result is a string, take first 50 characters
 * If result is an object, take max 50 characters from each string field
 */
export function truncateForLogging(result: unknown): unknown {
  if (typeof result === 'string') {
    return result.length > 50 ? result.substring(0, 50) + '...' : result;
  }

  if (result && typeof result === 'object' && !Array.isArray(result)) {
    const truncated: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(result)) {
      if (typeof value === 'string') {
        truncated[key] = value.length > 50 ? value.substring(0, 50) + '...' : value;
      } else if (Array.isArray(value)) {
        truncated[key] = `[${value.length} items]`;
      } else {
        truncated[key] = value;
      }
    }
    return truncated;
  }

  return result;
}
