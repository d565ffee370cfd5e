import { Readable } from 'stream';
import {
  connectionRefusedError,
  createFakeRequestHandler,
} from '../../test-utils/fake-request-handler';
import { createMockLogger } from '../../test-utils/powertools-mocks';
import { snsErrorResponse, snsSuccessResponse } from '../../test-utils/sns-responses';
import { SignatureError, TransportError } from '../../utils/error-handling/errors';
import { createSnsHttpClient, readBody, resolveEndpoint } from '../aws-http-client';
import { SnsCredentials } from '../credentials';
import { buildQueryParams } from '../query-params';

const TEST_CREDENTIALS: SnsCredentials = {
  accessKeyId: 'AKIDTEST',
  secretAccessKey: 'test-secret',
  region: 'us-east-1',
  source: 'explicit',
  profile: 'default',
};

const SIGNING_DATE = new Date('2024-01-02T03:04:05Z');

const LIST_TOPICS_RESPONSE = snsSuccessResponse('ListTopics', '<Topics/>', 'req-list');

describe('AWS HTTP client', () => {
  describe('request construction and signing', () => {
    it('should POST a form-encoded body to the regional endpoint', async () => {
      const fake = createFakeRequestHandler({ body: LIST_TOPICS_RESPONSE });
      const client = createSnsHttpClient({
        credentials: TEST_CREDENTIALS,
        requestHandler: fake.handler,
        logger: createMockLogger(),
        clock: () => SIGNING_DATE,
      });

      await client.sendQuery('ListTopics', buildQueryParams('ListTopics'));

      const [{ request, params }] = fake.requests;
      expect(request.method).toBe('POST');
      expect(request.protocol).toBe('https:');
      expect(request.hostname).toBe('sns.us-east-1.amazonaws.com');
      expect(request.path).toBe('/');
      expect(request.headers['content-type']).toBe(
        'application/x-www-form-urlencoded; charset=utf-8'
      );
      expect(request.body).toBe('Action=ListTopics&Version=2010-03-31');
      expect(params).toEqual({ Action: 'ListTopics', Version: '2010-03-31' });
    });

    it('should sign the request with Signature Version 4', async () => {
      const fake = createFakeRequestHandler({ body: LIST_TOPICS_RESPONSE });
      const client = createSnsHttpClient({
        credentials: TEST_CREDENTIALS,
        requestHandler: fake.handler,
        logger: createMockLogger(),
        clock: () => SIGNING_DATE,
      });

      await client.sendQuery('ListTopics', buildQueryParams('ListTopics'));

      const { headers } = fake.requests[0].request;
      expect(headers['x-amz-date']).toBe('20240102T030405Z');
      expect(headers.authorization).toMatch(
        /^AWS4-HMAC-SHA256 Credential=AKIDTEST\/20240102\/us-east-1\/sns\/aws4_request, SignedHeaders=\S+, Signature=[0-9a-f]{64}$/
      );
      expect(headers.authorization).not.toContain('test-secret');
      expect(headers['x-amz-security-token']).toBeUndefined();
    });

    it('should send the session token when there is one', async () => {
      const fake = createFakeRequestHandler({ body: LIST_TOPICS_RESPONSE });
      const client = createSnsHttpClient({
        credentials: { ...TEST_CREDENTIALS, sessionToken: 'test-session-token' },
        requestHandler: fake.handler,
        logger: createMockLogger(),
      });

      await client.sendQuery('ListTopics', buildQueryParams('ListTopics'));

      expect(fake.requests[0].request.headers['x-amz-security-token']).toBe('test-session-token');
    });

    it('should honor an endpoint override', async () => {
      const fake = createFakeRequestHandler({ body: LIST_TOPICS_RESPONSE });
      const client = createSnsHttpClient({
        credentials: TEST_CREDENTIALS,
        endpoint: 'http://localhost:4566',
        requestHandler: fake.handler,
        logger: createMockLogger(),
      });

      await client.sendQuery('ListTopics', buildQueryParams('ListTopics'));

      const { request } = fake.requests[0];
      expect(request.protocol).toBe('http:');
      expect(request.hostname).toBe('localhost');
      expect(request.port).toBe(4566);
      expect(request.headers.host).toBe('localhost:4566');
      expect(client.endpoint).toEqual({ service: 'sns', region: 'us-east-1', host: 'localhost:4566' });
    });

    it('should fail with SignatureError before sending when the secret is empty', async () => {
      const fake = createFakeRequestHandler({ body: LIST_TOPICS_RESPONSE });
      const client = createSnsHttpClient({
        credentials: { ...TEST_CREDENTIALS, secretAccessKey: '' },
        requestHandler: fake.handler,
        logger: createMockLogger(),
      });

      const promise = client.sendQuery('ListTopics', buildQueryParams('ListTopics'));

      await expect(promise).rejects.toBeInstanceOf(SignatureError);
      await expect(promise).rejects.toThrow(
        'Cannot sign request: secret access key is empty or contains whitespace'
      );
      expect(fake.handler.handle).not.toHaveBeenCalled();
    });

    it('should fail with SignatureError when the key id contains whitespace', async () => {
      const fake = createFakeRequestHandler({ body: LIST_TOPICS_RESPONSE });
      const client = createSnsHttpClient({
        credentials: { ...TEST_CREDENTIALS, accessKeyId: 'AKID TEST' },
        requestHandler: fake.handler,
        logger: createMockLogger(),
      });

      await expect(
        client.sendQuery('ListTopics', buildQueryParams('ListTopics'))
      ).rejects.toThrow('Cannot sign request: access key id is empty or contains whitespace');
    });
  });

  describe('transport failures', () => {
    it('should raise TransportError without retrying on connection refused', async () => {
      const refused = connectionRefusedError();
      const fake = createFakeRequestHandler(refused, { body: LIST_TOPICS_RESPONSE });
      const logger = createMockLogger();
      const client = createSnsHttpClient({
        credentials: TEST_CREDENTIALS,
        requestHandler: fake.handler,
        logger,
      });

      const promise = client.sendQuery('ListTopics', buildQueryParams('ListTopics'));

      await expect(promise).rejects.toBeInstanceOf(TransportError);
      await expect(promise).rejects.toMatchObject({
        message:
          'ListTopics request to sns.us-east-1.amazonaws.com failed: ECONNREFUSED: connect ECONNREFUSED 127.0.0.1:4566',
        action: 'ListTopics',
        host: 'sns.us-east-1.amazonaws.com',
        cause: refused,
      });
      expect(fake.handler.handle).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith('AWS HTTP request failed', {
        service: 'sns',
        action: 'ListTopics',
        host: 'sns.us-east-1.amazonaws.com',
        error: 'ECONNREFUSED: connect ECONNREFUSED 127.0.0.1:4566',
      });
    });
  });

  describe('response handling', () => {
    it('should return the parsed envelope', async () => {
      const fake = createFakeRequestHandler({
        body: snsSuccessResponse('Publish', '<MessageId>msg-1</MessageId>', 'req-pub'),
      });
      const client = createSnsHttpClient({
        credentials: TEST_CREDENTIALS,
        requestHandler: fake.handler,
        logger: createMockLogger(),
      });

      const parsed = await client.sendQuery('Publish', buildQueryParams('Publish'));

      expect(parsed.requestId).toBe('req-pub');
      expect(parsed.result.trim()).toBe('<MessageId>msg-1</MessageId>');
    });

    it('should raise ApiError for fault responses', async () => {
      const fake = createFakeRequestHandler({
        statusCode: 403,
        body: snsErrorResponse('AuthorizationError', 'User is not authorized', 'req-403'),
      });
      const client = createSnsHttpClient({
        credentials: TEST_CREDENTIALS,
        requestHandler: fake.handler,
        logger: createMockLogger(),
      });

      await expect(
        client.sendQuery('Publish', buildQueryParams('Publish'))
      ).rejects.toMatchObject({
        name: 'ApiError',
        code: 'AuthorizationError',
        serviceCode: 'AuthorizationError',
        message: 'User is not authorized',
        requestId: 'req-403',
        statusCode: 403,
        type: 'Sender',
      });
    });
  });

  describe('readBody', () => {
    it('should read strings, buffers and streams', async () => {
      expect(await readBody('plain')).toBe('plain');
      expect(await readBody(Buffer.from('bytes'))).toBe('bytes');
      expect(await readBody(Readable.from(['str', 'eam']))).toBe('stream');
      expect(await readBody(undefined)).toBe('');
    });

    it('should reject unsupported bodies', async () => {
      await expect(readBody(42)).rejects.toThrow('Unsupported response body of type number');
    });
  });

  describe('resolveEndpoint', () => {
    it('should build the regional SNS host by default', () => {
      expect(resolveEndpoint({ service: 'sns', region: 'eu-west-1' })).toEqual({
        protocol: 'https:',
        hostname: 'sns.eu-west-1.amazonaws.com',
        path: '/',
        host: 'sns.eu-west-1.amazonaws.com',
      });
    });
  });
});
