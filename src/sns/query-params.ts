/**
 * Flattening of structured parameters into the query protocol naming convention
 * (Attributes.entry.1.key, AWSAccountId.member.1, MessageAttributes.entry.1.Name, ...)
 */

export const SNS_API_VERSION = '2010-03-31';

export type QueryParams = Record<string, string>;

export type QueryParamInput = Record<string, string | number | boolean | undefined>;

/**
 * Value of one message attribute, as accepted by Publish
 */
export type MessageAttributeValue =
  | { dataType: 'String' | 'String.Array' | 'Number'; stringValue: string }
  | { dataType: 'Binary'; binaryValue: Uint8Array };

/**
 * Build the parameter set of one action. Undefined values are dropped.
 */
export function buildQueryParams(action: string, ...groups: QueryParamInput[]): QueryParams {
  const params: QueryParams = {
    Action: action,
    Version: SNS_API_VERSION,
  };

  for (const group of groups) {
    for (const [key, value] of Object.entries(group)) {
      if (value !== undefined) {
        params[key] = String(value);
      }
    }
  }

  return params;
}

/**
 * ['a', 'b'] -> { 'Prefix.member.1': 'a', 'Prefix.member.2': 'b' }
 */
export function flattenMembers(prefix: string, values: readonly string[]): QueryParams {
  const params: QueryParams = {};
  values.forEach((value, index) => {
    params[`${prefix}.member.${index + 1}`] = value;
  });
  return params;
}

/**
 * { k: 'v' } -> { 'Prefix.entry.1.key': 'k', 'Prefix.entry.1.value': 'v' }
 * Entries are sorted by key so the same map always encodes the same way.
 */
export function flattenEntries(
  prefix: string,
  map: Readonly<Record<string, string | undefined>>
): QueryParams {
  const params: QueryParams = {};
  const entries = Object.entries(map)
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  entries.forEach(([key, value], index) => {
    params[`${prefix}.entry.${index + 1}.key`] = key;
    params[`${prefix}.entry.${index + 1}.value`] = value;
  });
  return params;
}

/**
 * Tags use Key/Value members: Tags.member.1.Key, Tags.member.1.Value
 */
export function flattenTags(tags: Readonly<Record<string, string>>): QueryParams {
  const params: QueryParams = {};
  Object.entries(tags)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .forEach(([key, value], index) => {
      params[`Tags.member.${index + 1}.Key`] = key;
      params[`Tags.member.${index + 1}.Value`] = value;
    });
  return params;
}

export function flattenMessageAttributes(
  attributes: Readonly<Record<string, MessageAttributeValue>>
): QueryParams {
  const params: QueryParams = {};
  Object.keys(attributes)
    .sort()
    .forEach((name, index) => {
      const prefix = `MessageAttributes.entry.${index + 1}`;
      const value = attributes[name];
      params[`${prefix}.Name`] = name;
      params[`${prefix}.Value.DataType`] = value.dataType;
      if (value.dataType === 'Binary') {
        params[`${prefix}.Value.BinaryValue`] = Buffer.from(value.binaryValue).toString('base64');
      } else {
        params[`${prefix}.Value.StringValue`] = value.stringValue;
      }
    });
  return params;
}

/**
 * RFC 3986 percent-encoding, as the signer expects for form bodies
 */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Encode parameters as an application/x-www-form-urlencoded body, in insertion order
 */
export function encodeQueryBody(params: QueryParams): string {
  return Object.entries(params)
    .map(([key, value]) => `${percentEncode(key)}=${percentEncode(value)}`)
    .join('&');
}
