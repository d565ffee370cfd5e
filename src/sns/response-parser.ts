/**
 * Decoding of SNS query protocol XML responses
 *
 * Success: <{Action}Response><{Action}Result>...</{Action}Result><ResponseMetadata><RequestId/></ResponseMetadata></{Action}Response>
 * Fault:   <ErrorResponse><Error><Type/><Code/><Message/></Error><RequestId/></ErrorResponse>
 */

import { ApiError } from '../utils/error-handling/errors';

export interface SnsHttpResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export interface ParsedSnsResponse {
  requestId: string;
  /** Inner XML of the {Action}Result element, empty when the action returns no result */
  result: string;
}

const XML_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

const MAX_CODE_POINT = 0x10ffff;

function decodeCharacterReference(codePoint: number, entity: string): string {
  return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : entity;
}

/**
 * Replace entity and character references. References that do not decode are left as written.
 */
export function unescapeXml(str: string): string {
  return str.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-z]+);/g, (entity, name: string) => {
    if (name.startsWith('#x')) {
      return decodeCharacterReference(parseInt(name.slice(2), 16), entity);
    }
    if (name.startsWith('#')) {
      return decodeCharacterReference(parseInt(name.slice(1), 10), entity);
    }
    return XML_ENTITIES[name] ?? entity;
  });
}

/**
 * Inner XML of the first element with the given tag, '' for a self-closing element,
 * undefined when the element is absent
 */
export function readElement(xml: string, tag: string): string | undefined {
  const match = new RegExp(`<${tag}(?:\\s[^>]*)?(?:/>|>([\\s\\S]*?)</${tag}>)`).exec(xml);
  if (!match) {
    return undefined;
  }
  return match[1] ?? '';
}

/**
 * Unescaped text content of the first element with the given tag, whitespace kept
 */
export function readText(xml: string, tag: string): string | undefined {
  const inner = readElement(xml, tag);
  return inner === undefined ? undefined : unescapeXml(inner);
}

/**
 * Text of an identifier element (ARN, token, id, code), trimmed
 */
export function readIdentifier(xml: string, tag: string): string | undefined {
  return readText(xml, tag)?.trim();
}

function readAll(xml: string, tag: string): string[] {
  const regex = new RegExp(`<${tag}(?:\\s[^>]*)?(?:/>|>([\\s\\S]*?)</${tag}>)`, 'g');
  const found: string[] = [];
  let match: RegExpExecArray | null;
  while ((match = regex.exec(xml)) !== null) {
    found.push(match[1] ?? '');
  }
  return found;
}

/**
 * Inner XML of every <member> of a container element
 */
export function readMembers(xml: string, container: string): string[] {
  const inner = readElement(xml, container);
  return inner === undefined ? [] : readAll(inner, 'member');
}

/**
 * <container><entry><key>k</key><value>v</value></entry></container> -> { k: v }
 */
export function readEntries(xml: string, container: string): Record<string, string> {
  const inner = readElement(xml, container);
  const entries: Record<string, string> = {};
  if (inner === undefined) {
    return entries;
  }

  for (const entry of readAll(inner, 'entry')) {
    const key = readIdentifier(entry, 'key');
    if (key !== undefined) {
      entries[key] = readText(entry, 'value') ?? '';
    }
  }
  return entries;
}

function headerValue(headers: Record<string, string>, name: string): string | undefined {
  const match = Object.entries(headers).find(([key]) => key.toLowerCase() === name);
  return match?.[1];
}

function parseFaultType(value: string | undefined): 'Sender' | 'Receiver' | undefined {
  return value === 'Sender' || value === 'Receiver' ? value : undefined;
}

/**
 * Parse one response envelope
 * @throws ApiError when the service reports a fault or the envelope is not the expected one
 */
export function parseSnsResponse(action: string, response: SnsHttpResponse): ParsedSnsResponse {
  const { statusCode, body } = response;
  const headerRequestId = headerValue(response.headers, 'x-amzn-requestid') ?? '';
  const isHttpSuccess = statusCode >= 200 && statusCode < 300;

  const errorEnvelope = readElement(body, 'ErrorResponse');
  if (errorEnvelope !== undefined) {
    const error = readElement(errorEnvelope, 'Error') ?? '';
    throw new ApiError({
      code: readIdentifier(error, 'Code') || 'UnknownError',
      message: readText(error, 'Message') ?? '',
      requestId: readIdentifier(errorEnvelope, 'RequestId') || headerRequestId,
      statusCode,
      type: parseFaultType(readIdentifier(error, 'Type')),
    });
  }

  if (!isHttpSuccess) {
    throw new ApiError({
      code: 'UnknownError',
      message: `HTTP ${statusCode}`,
      requestId: headerRequestId,
      statusCode,
    });
  }

  const envelope = readElement(body, `${action}Response`);
  if (envelope === undefined) {
    throw new ApiError({
      code: 'MalformedResponse',
      message: `Response did not contain a ${action}Response element`,
      requestId: headerRequestId,
      statusCode,
    });
  }

  return {
    requestId: readIdentifier(envelope, 'RequestId') || headerRequestId,
    result: readElement(envelope, `${action}Result`) ?? '',
  };
}
