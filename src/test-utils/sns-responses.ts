/**
 * Builders for SNS query protocol response documents used by the tests
 */

const SNS_XMLNS = 'http://sns.amazonaws.com/doc/2010-03-31/';

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function snsSuccessResponse(action: string, resultBody: string, requestId: string): string {
  return [
    `<${action}Response xmlns="${SNS_XMLNS}">`,
    `  <${action}Result>`,
    `    ${resultBody}`,
    `  </${action}Result>`,
    `  <ResponseMetadata>`,
    `    <RequestId>${requestId}</RequestId>`,
    `  </ResponseMetadata>`,
    `</${action}Response>`,
  ].join('\n');
}

/**
 * Envelope of actions that return nothing but the request id (DeleteTopic, Unsubscribe, ...)
 */
export function snsEmptyResponse(action: string, requestId: string): string {
  return [
    `<${action}Response xmlns="${SNS_XMLNS}">`,
    `  <ResponseMetadata>`,
    `    <RequestId>${requestId}</RequestId>`,
    `  </ResponseMetadata>`,
    `</${action}Response>`,
  ].join('\n');
}

export function snsErrorResponse(
  code: string,
  message: string,
  requestId: string,
  type: 'Sender' | 'Receiver' = 'Sender'
): string {
  return [
    `<ErrorResponse xmlns="${SNS_XMLNS}">`,
    `  <Error>`,
    `    <Type>${type}</Type>`,
    `    <Code>${code}</Code>`,
    `    <Message>${escapeXml(message)}</Message>`,
    `  </Error>`,
    `  <RequestId>${requestId}</RequestId>`,
    `</ErrorResponse>`,
  ].join('\n');
}

export function subscriptionMembersXml(
  subscriptions: Array<{
    subscriptionArn: string;
    topicArn: string;
    protocol: string;
    endpoint: string;
    owner: string;
  }>
): string {
  const members = subscriptions
    .map(
      (s) => `<member>
        <SubscriptionArn>${escapeXml(s.subscriptionArn)}</SubscriptionArn>
        <TopicArn>${escapeXml(s.topicArn)}</TopicArn>
        <Protocol>${escapeXml(s.protocol)}</Protocol>
        <Endpoint>${escapeXml(s.endpoint)}</Endpoint>
        <Owner>${escapeXml(s.owner)}</Owner>
      </member>`
    )
    .join('\n    ');
  return `<Subscriptions>${members}</Subscriptions>`;
}
