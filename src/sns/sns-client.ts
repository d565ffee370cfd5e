/**
 * SNS client construction
 * Resolves credentials once and binds them, with the transport, to a set of operations
 */

import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics } from '@aws-lambda-powertools/metrics';
import { createLogger } from '../powertools';
import { createSnsHttpClient, SnsRequestHandler } from './aws-http-client';
import { CredentialSource, CredentialSourceOptions, resolveCredentials } from './credentials';
import { createSnsWrapper, SnsWrapper } from './sns-wrapper';

export interface SnsClientConfig extends CredentialSourceOptions {
  /** Endpoint URL override (local emulator, VPC endpoint) */
  endpoint?: string;
  connectionTimeoutMs?: number;
  requestTimeoutMs?: number;
  requestHandler?: SnsRequestHandler;
  logger?: Logger;
  metrics?: Metrics;
  /** Source of the signing timestamp */
  clock?: () => Date;
}

/**
 * Credential details that are safe to expose
 */
export interface SnsClientIdentity {
  accessKeyId: string;
  region: string;
  source: CredentialSource;
  profile: string;
  hasSessionToken: boolean;
}

export type SnsClient = SnsWrapper & {
  readonly region: string;
  readonly identity: SnsClientIdentity;
  readonly host: string;
};

/**
 * Create an SNS client with its own resolved configuration
 * @throws MissingCredentialsError when no credential source yields a key pair
 */
export async function createSnsClient(config: SnsClientConfig = {}): Promise<SnsClient> {
  const logger = config.logger ?? createLogger();
  const credentials = await resolveCredentials(config, logger);

  const context = { region: credentials.region };
  const httpClient = createSnsHttpClient({
    credentials,
    endpoint: config.endpoint,
    requestHandler: config.requestHandler,
    connectionTimeoutMs: config.connectionTimeoutMs,
    requestTimeoutMs: config.requestTimeoutMs,
    clock: config.clock,
    logger,
  });

  const wrapper = createSnsWrapper(httpClient, { logger, metrics: config.metrics, context });

  logger.debug('SNS client created', {
    region: credentials.region,
    host: httpClient.endpoint.host,
    credentialSource: credentials.source,
  });

  return {
    ...wrapper,
    region: credentials.region,
    host: httpClient.endpoint.host,
    identity: {
      accessKeyId: credentials.accessKeyId,
      region: credentials.region,
      source: credentials.source,
      profile: credentials.profile,
      hasSessionToken: credentials.sessionToken !== undefined,
    },
  };
}
