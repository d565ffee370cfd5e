/**
 * Credential resolution for the SNS client
 *
 * Key pair precedence: explicit options > environment variables > shared credentials file profile.
 * Nothing here writes to process.env; the resolved set belongs to the client that asked for it.
 */

import { Logger } from '@aws-lambda-powertools/logger';
import { fromEnv } from '@aws-sdk/credential-provider-env';
import { chain, CredentialsProviderError } from '@smithy/property-provider';
import { loadSharedConfigFiles } from '@smithy/shared-ini-file-loader';
import type { AwsCredentialIdentity, AwsCredentialIdentityProvider } from '@smithy/types';
import { MissingCredentialsError } from '../utils/error-handling/errors';

export const DEFAULT_PROFILE = 'default';
export const DEFAULT_REGION = 'us-east-1';

export type CredentialSource = 'explicit' | 'environment' | 'profile';

/**
 * Where credentials may come from
 */
export interface CredentialSourceOptions {
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
  region?: string;
  /** Named profile in the shared credentials/config files (default: AWS_PROFILE, then "default") */
  profile?: string;
  /** Path of the shared credentials file (default: AWS_SHARED_CREDENTIALS_FILE, then ~/.aws/credentials) */
  credentialsFile?: string;
  /** Path of the shared config file (default: AWS_CONFIG_FILE, then ~/.aws/config) */
  configFile?: string;
}

/**
 * Fully resolved credential set
 */
export interface SnsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  region: string;
  source: CredentialSource;
  profile: string;
}

type ProfileEntry = Record<string, string | undefined>;

/**
 * Load a profile from the shared files. Credentials-file values win over config-file values.
 * The files are read again on every call, so rotated keys are picked up by the next client.
 */
export async function loadProfile(
  profileName: string,
  options: Pick<CredentialSourceOptions, 'credentialsFile' | 'configFile'> = {}
): Promise<ProfileEntry> {
  const { configFile, credentialsFile } = await loadSharedConfigFiles({
    filepath: options.credentialsFile,
    configFilepath: options.configFile,
    ignoreCache: true,
  });

  return {
    ...configFile[profileName],
    ...credentialsFile[profileName],
  };
}

function fromExplicit(options: CredentialSourceOptions): AwsCredentialIdentityProvider {
  return async () => {
    if (!options.accessKeyId || !options.secretAccessKey) {
      throw new CredentialsProviderError('No explicit key pair supplied', { tryNextLink: true });
    }

    return {
      accessKeyId: options.accessKeyId,
      secretAccessKey: options.secretAccessKey,
      sessionToken: options.sessionToken,
    };
  };
}

function fromProfileEntry(profileName: string, entry: ProfileEntry): AwsCredentialIdentityProvider {
  return async () => {
    const accessKeyId = entry.aws_access_key_id;
    const secretAccessKey = entry.aws_secret_access_key;

    if (!accessKeyId || !secretAccessKey) {
      throw new CredentialsProviderError(`Profile "${profileName}" has no static key pair`, {
        tryNextLink: true,
      });
    }

    return {
      accessKeyId,
      secretAccessKey,
      sessionToken: entry.aws_session_token,
    };
  };
}

/**
 * Region precedence: explicit > AWS_DEFAULT_REGION > AWS_REGION > profile > us-east-1
 */
export function resolveRegion(explicitRegion: string | undefined, profileEntry: ProfileEntry): string {
  return (
    explicitRegion ||
    process.env.AWS_DEFAULT_REGION ||
    process.env.AWS_REGION ||
    profileEntry.region ||
    DEFAULT_REGION
  );
}

/**
 * Resolve the credential set for one client
 * @throws MissingCredentialsError when no source yields a key id and secret
 */
export async function resolveCredentials(
  options: CredentialSourceOptions,
  logger: Logger
): Promise<SnsCredentials> {
  const profileName = options.profile || process.env.AWS_PROFILE || DEFAULT_PROFILE;
  const profileEntry = await loadProfile(profileName, options);

  const resolved: { source?: CredentialSource } = {};
  const tagged =
    (tag: CredentialSource, provider: AwsCredentialIdentityProvider): AwsCredentialIdentityProvider =>
    async () => {
      const identity = await provider();
      resolved.source = tag;
      return identity;
    };

  if (options.accessKeyId && !options.secretAccessKey) {
    logger.warn('Explicit access key id given without a secret key, ignoring it', {
      accessKeyId: options.accessKeyId,
    });
  }

  const provider = chain(
    tagged('explicit', fromExplicit(options)),
    tagged('environment', fromEnv()),
    tagged('profile', fromProfileEntry(profileName, profileEntry))
  );

  let identity: AwsCredentialIdentity;
  try {
    identity = await provider();
  } catch (error) {
    logger.debug('Credential chain exhausted', {
      profile: profileName,
      reason: error instanceof Error ? error.message : String(error),
    });
    throw new MissingCredentialsError(
      `No AWS credentials found: checked explicit options, environment variables and profile "${profileName}"`,
      ['explicit', 'environment', `profile:${profileName}`]
    );
  }

  const { source } = resolved;
  if (!source) {
    throw new MissingCredentialsError('Credential chain returned no source', []);
  }

  const credentials: SnsCredentials = {
    accessKeyId: identity.accessKeyId,
    secretAccessKey: identity.secretAccessKey,
    sessionToken: identity.sessionToken || undefined,
    region: resolveRegion(options.region, profileEntry),
    source,
    profile: profileName,
  };

  logger.debug('Resolved AWS credentials', {
    source: credentials.source,
    profile: credentials.profile,
    region: credentials.region,
    accessKeyId: credentials.accessKeyId,
    hasSessionToken: credentials.sessionToken !== undefined,
  });

  return credentials;
}
