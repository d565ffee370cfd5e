import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics } from '@aws-lambda-powertools/metrics';

/**
 * Powertools mock instances for tests.
 * The manual mocks under src/__mocks__ replace the real classes, so every method is a jest.fn().
 */

export function createMockLogger(): jest.Mocked<Logger> {
  return new Logger() as jest.Mocked<Logger>;
}

export function createMockMetrics(): jest.Mocked<Metrics> {
  return new Metrics() as jest.Mocked<Metrics>;
}

/**
 * Logger and Metrics mocks together
 */
export function createMockPowertools(): {
  mockLogger: jest.Mocked<Logger>;
  mockMetrics: jest.Mocked<Metrics>;
} {
  return {
    mockLogger: createMockLogger(),
    mockMetrics: createMockMetrics(),
  };
}
