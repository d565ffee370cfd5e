/**
 * Shared PowerTools initialization module
 * Provides the default logger and metrics instances used when a client is built without them
 */

import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics } from '@aws-lambda-powertools/metrics';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

interface PowerToolsConfig {
  serviceName?: string;
  logLevel?: LogLevel;
  namespace?: string;
}

interface PowerToolsInstances {
  logger: Logger;
  metrics: Metrics;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const upper = value?.toUpperCase();
  return LOG_LEVELS.find((level) => level === upper);
}

function resolveServiceName(config: PowerToolsConfig): string {
  return config.serviceName || process.env.POWERTOOLS_SERVICE_NAME || 'sns-client';
}

/**
 * Logger alone, for callers that record no metrics
 */
export function createLogger(config: Pick<PowerToolsConfig, 'serviceName' | 'logLevel'> = {}): Logger {
  const logLevel = config.logLevel || parseLogLevel(process.env.POWERTOOLS_LOG_LEVEL) || 'INFO';
  return new Logger({ serviceName: resolveServiceName(config), logLevel });
}

/**
 * Initialize PowerTools instances with consistent configuration
 * @param config Configuration options for PowerTools
 * @returns Initialized logger and metrics instances
 */
export function initializePowerTools(config: PowerToolsConfig = {}): PowerToolsInstances {
  const serviceName = resolveServiceName(config);
  const namespace = config.namespace || process.env.POWERTOOLS_METRICS_NAMESPACE || 'sns-client';

  const logger = createLogger(config);

  const metrics = new Metrics({
    namespace,
    serviceName,
  });

  return {
    logger,
    metrics,
  };
}
