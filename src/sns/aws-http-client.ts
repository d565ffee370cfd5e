/**
 * AWS query protocol HTTP request utility
 *
 * Builds form-encoded POST requests for an AWS query API (SNS), signs them with
 * Signature Version 4 and sends them through a request handler.
 */

import { Sha256 } from '@aws-crypto/sha256-js';
import { Logger } from '@aws-lambda-powertools/logger';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { HttpRequest, HttpResponse } from '@smithy/protocol-http';
import { SignatureV4 } from '@smithy/signature-v4';
import { SignatureError, TransportError } from '../utils/error-handling/errors';
import { SnsCredentials } from './credentials';
import { encodeQueryBody, QueryParams } from './query-params';
import { ParsedSnsResponse, parseSnsResponse, SnsHttpResponse } from './response-parser';

export const DEFAULT_CONNECTION_TIMEOUT_MS = 5_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * AWS service endpoint configuration
 */
export interface AwsServiceEndpoint {
  service: string;
  region: string;
  /** Full URL override, e.g. http://localhost:4566 for a local emulator */
  endpoint?: string;
}

/**
 * Anything that can send a signed request. NodeHttpHandler satisfies this.
 */
export interface SnsRequestHandler {
  handle(request: HttpRequest): Promise<{ response: HttpResponse }>;
}

export interface AwsHttpClientConfig {
  logger: Logger;
  credentials: SnsCredentials;
  requestHandler?: SnsRequestHandler;
  connectionTimeoutMs?: number;
  requestTimeoutMs?: number;
  /** Source of the signing timestamp */
  clock?: () => Date;
}

interface ResolvedEndpoint {
  protocol: string;
  hostname: string;
  port?: number;
  path: string;
  host: string;
}

export function resolveEndpoint(endpoint: AwsServiceEndpoint): ResolvedEndpoint {
  if (!endpoint.endpoint) {
    const hostname = `${endpoint.service}.${endpoint.region}.amazonaws.com`;
    return { protocol: 'https:', hostname, path: '/', host: hostname };
  }

  const url = new URL(endpoint.endpoint);
  const port = url.port ? Number(url.port) : undefined;
  return {
    protocol: url.protocol,
    hostname: url.hostname,
    port,
    path: url.pathname || '/',
    host: url.host,
  };
}

function assertSignable(credentials: SnsCredentials): void {
  const problems: string[] = [];
  if (!credentials.accessKeyId || /\s/.test(credentials.accessKeyId)) {
    problems.push('access key id is empty or contains whitespace');
  }
  if (!credentials.secretAccessKey || /\s/.test(credentials.secretAccessKey)) {
    problems.push('secret access key is empty or contains whitespace');
  }
  if (!credentials.region) {
    problems.push('region is empty');
  }
  if (problems.length > 0) {
    throw new SignatureError(`Cannot sign request: ${problems.join(', ')}`);
  }
}

function chunkToBuffer(chunk: unknown): Buffer {
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  throw new TypeError(`Unexpected response body chunk of type ${typeof chunk}`);
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.asyncIterator in value &&
    typeof value[Symbol.asyncIterator] === 'function'
  );
}

/**
 * Collect a response body (stream, buffer or string) into a UTF-8 string
 */
export async function readBody(body: unknown): Promise<string> {
  if (body === undefined || body === null) {
    return '';
  }
  if (typeof body === 'string' || body instanceof Uint8Array) {
    return chunkToBuffer(body).toString('utf8');
  }
  if (isAsyncIterable(body)) {
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      chunks.push(chunkToBuffer(chunk));
    }
    return Buffer.concat(chunks).toString('utf8');
  }
  throw new TypeError(`Unsupported response body of type ${typeof body}`);
}

function describeTransportFailure(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? `${error.code}: ` : '';
    return `${code}${error.message}`;
  }
  return String(error);
}

/**
 * Create AWS query protocol HTTP client
 */
export function createAwsHttpClient(endpoint: AwsServiceEndpoint, config: AwsHttpClientConfig) {
  const { service, region } = endpoint;
  const target = resolveEndpoint(endpoint);
  const { logger, credentials, clock = () => new Date() } = config;
  const handler: SnsRequestHandler =
    config.requestHandler ??
    new NodeHttpHandler({
      connectionTimeout: config.connectionTimeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS,
      requestTimeout: config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    });

  const signer = new SignatureV4({
    credentials: {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
      sessionToken: credentials.sessionToken,
    },
    region,
    service,
    sha256: Sha256,
  });

  async function signRequest(request: HttpRequest): Promise<HttpRequest> {
    assertSignable(credentials);

    try {
      const signed = await signer.sign(request, { signingDate: clock() });
      return new HttpRequest(signed);
    } catch (error) {
      throw new SignatureError('Failed to sign request', { cause: error });
    }
  }

  /**
   * Make a signed query request and return the raw response
   */
  async function makeRequest(action: string, params: QueryParams): Promise<SnsHttpResponse> {
    const body = encodeQueryBody(params);

    const request = new HttpRequest({
      method: 'POST',
      protocol: target.protocol,
      hostname: target.hostname,
      port: target.port,
      path: target.path,
      headers: {
        'content-type': 'application/x-www-form-urlencoded; charset=utf-8',
        'content-length': Buffer.byteLength(body, 'utf8').toString(),
        host: target.host,
      },
      body,
    });

    const signedRequest = await signRequest(request);

    logger.debug('Making AWS HTTP request', {
      service,
      action,
      url: `${target.protocol}//${target.host}${target.path}`,
      bodyLength: Buffer.byteLength(body, 'utf8'),
    });

    let responseBody: string;
    let response: HttpResponse;
    try {
      ({ response } = await handler.handle(signedRequest));
      responseBody = await readBody(response.body);
    } catch (error) {
      logger.error('AWS HTTP request failed', {
        service,
        action,
        host: target.host,
        error: describeTransportFailure(error),
      });
      throw new TransportError(
        `${action} request to ${target.host} failed: ${describeTransportFailure(error)}`,
        { action, host: target.host, cause: error }
      );
    }

    logger.debug('AWS HTTP response received', {
      service,
      action,
      statusCode: response.statusCode,
      bodyLength: responseBody.length,
      success: response.statusCode >= 200 && response.statusCode < 300,
    });

    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body: responseBody,
    };
  }

  /**
   * Make a signed query request and decode the response envelope
   */
  async function sendQuery(action: string, params: QueryParams): Promise<ParsedSnsResponse> {
    const response = await makeRequest(action, params);
    return parseSnsResponse(action, response);
  }

  return {
    makeRequest,
    sendQuery,
    endpoint: { service, region, host: target.host },
  };
}

export type AwsHttpClient = ReturnType<typeof createAwsHttpClient>;

/**
 * Create SNS HTTP client
 */
export function createSnsHttpClient(
  config: AwsHttpClientConfig & { endpoint?: string }
): AwsHttpClient {
  return createAwsHttpClient(
    { service: 'sns', region: config.credentials.region, endpoint: config.endpoint },
    config
  );
}
