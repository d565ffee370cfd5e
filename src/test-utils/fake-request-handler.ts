import { Readable } from 'stream';
import { HttpRequest, HttpResponse } from '@smithy/protocol-http';
import { SnsRequestHandler } from '../sns/aws-http-client';

/**
 * In-process stand-in for NodeHttpHandler.
 * Replies with queued responses in order and records every request it receives.
 */

export interface FakeResponse {
  statusCode?: number;
  headers?: Record<string, string>;
  body: string;
}

export interface RecordedRequest {
  request: HttpRequest;
  /** Decoded form parameters of the request body */
  params: Record<string, string>;
}

export interface FakeRequestHandler {
  handler: SnsRequestHandler & { handle: jest.Mock };
  requests: RecordedRequest[];
  enqueue(...responses: Array<FakeResponse | Error>): void;
}

export function decodeFormBody(body: string): Record<string, string> {
  return Object.fromEntries(new URLSearchParams(body).entries());
}

export function createFakeRequestHandler(
  ...initialResponses: Array<FakeResponse | Error>
): FakeRequestHandler {
  const queue: Array<FakeResponse | Error> = [...initialResponses];
  const requests: RecordedRequest[] = [];

  const handle = jest.fn(async (request: HttpRequest): Promise<{ response: HttpResponse }> => {
    requests.push({ request, params: decodeFormBody(String(request.body ?? '')) });

    const next = queue.shift();
    if (next === undefined) {
      throw new Error('No fake response queued');
    }
    if (next instanceof Error) {
      throw next;
    }

    return {
      response: new HttpResponse({
        statusCode: next.statusCode ?? 200,
        headers: { 'content-type': 'text/xml', ...next.headers },
        body: Readable.from([next.body]),
      }),
    };
  });

  return {
    handler: { handle },
    requests,
    enqueue(...responses) {
      queue.push(...responses);
    },
  };
}

/**
 * Error shaped like the one Node raises when nothing listens on the port
 */
export function connectionRefusedError(): Error {
  return Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:4566'), {
    code: 'ECONNREFUSED',
    errno: -111,
    syscall: 'connect',
  });
}
