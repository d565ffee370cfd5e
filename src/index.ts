/**
 * SNS query API client
 * Re-exports the client factory, operation parameter and result types, and errors
 */

// Client
export { createSnsClient, type SnsClient, type SnsClientConfig, type SnsClientIdentity } from './sns/sns-client';
export { createSnsWrapper, type SnsWrapper } from './sns/sns-wrapper';
export {
  createAwsHttpClient,
  createSnsHttpClient,
  type AwsHttpClient,
  type AwsHttpClientConfig,
  type SnsRequestHandler,
} from './sns/aws-http-client';

// Credentials
export {
  resolveCredentials,
  loadProfile,
  DEFAULT_PROFILE,
  DEFAULT_REGION,
  type CredentialSource,
  type CredentialSourceOptions,
  type SnsCredentials,
} from './sns/credentials';

// Parameters and results
export {
  serializeMessage,
  MESSAGE_PROTOCOL_KEYS,
  type SnsMessage,
  type ProtocolMessageMap,
} from './sns/message';
export * from './sns/operation-params';
export * from './sns/types';
export { type MessageAttributeValue } from './sns/query-params';

// Errors
export {
  SnsClientError,
  MissingCredentialsError,
  SignatureError,
  TransportError,
  ParameterValidationError,
  ApiError,
} from './utils/error-handling/errors';

export { createLogger, initializePowerTools } from './powertools';
