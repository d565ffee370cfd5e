/**
 * Publish message payloads
 *
 * A message is either one string for every endpoint type, or a map of per-protocol bodies
 * that must carry a "default" body. Maps are sent as JSON with MessageStructure=json.
 */

import { createValidator, isOneOf } from '../utils/validation';

export const MESSAGE_PROTOCOL_KEYS = [
  'default',
  'email',
  'email-json',
  'sqs',
  'lambda',
  'http',
  'https',
  'sms',
  'application',
  'firehose',
  'APNS',
  'APNS_SANDBOX',
  'APNS_VOIP',
  'APNS_VOIP_SANDBOX',
  'MACOS',
  'MACOS_SANDBOX',
  'GCM',
  'ADM',
  'BAIDU',
  'MPNS',
  'WNS',
] as const;

export type MessageProtocolKey = (typeof MESSAGE_PROTOCOL_KEYS)[number];

export type ProtocolMessageMap = { default: string } & Partial<
  Record<Exclude<MessageProtocolKey, 'default'>, string>
>;

export type SnsMessage = string | ProtocolMessageMap;

export interface SerializedMessage {
  Message: string;
  MessageStructure?: 'json';
}

/**
 * Serialize a message into the Message / MessageStructure parameters.
 * A map holding only "default" encodes exactly like the plain string.
 * @throws ParameterValidationError for a map without a string "default" or with unknown protocols
 */
export function serializeMessage(message: SnsMessage | Record<string, unknown>): SerializedMessage {
  if (typeof message === 'string') {
    return { Message: message };
  }

  // Protocols set to undefined are absent
  const bodies: Record<string, unknown> = Object.fromEntries(
    Object.entries(message).filter(([, body]) => body !== undefined)
  );

  const validator = createValidator()
    .custom(() =>
      typeof bodies.default === 'string'
        ? null
        : 'Message map must contain a string "default" body'
    )
    .knownKeys(bodies, MESSAGE_PROTOCOL_KEYS, 'Message map');

  for (const [protocol, body] of Object.entries(bodies)) {
    if (isOneOf(protocol, MESSAGE_PROTOCOL_KEYS) && typeof body !== 'string') {
      validator.custom(() => `Message body for "${protocol}" must be a string`);
    }
  }

  validator.assert();

  const defaultBody = bodies.default;
  if (Object.keys(bodies).length === 1 && typeof defaultBody === 'string') {
    return { Message: defaultBody };
  }

  return {
    Message: JSON.stringify(bodies),
    MessageStructure: 'json',
  };
}
