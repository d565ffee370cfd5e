/**
 * Result types of the SNS operations.
 * Every result is tagged with its operation and carries the service request id.
 */

export type SnsResult<TKind extends string, TPayload extends object = Record<never, never>> = {
  kind: TKind;
  requestId: string;
} & TPayload;

/** Sentinel the service returns from Subscribe until the endpoint confirms */
export const PENDING_CONFIRMATION = 'pending confirmation';

export interface SubscriptionRow {
  endpoint: string;
  owner: string;
  protocol: string;
  subscriptionArn: string;
  topicArn: string;
}

export type CreateTopicResult = SnsResult<'CreateTopic', { topicArn: string }>;

export type DeleteTopicResult = SnsResult<'DeleteTopic', { success: true }>;

export type SetTopicAttributesResult = SnsResult<
  'SetTopicAttributes',
  { success: true; attributeName: string }
>;

export type GetTopicAttributesResult = SnsResult<
  'GetTopicAttributes',
  { attributes: Record<string, string> }
>;

export type ListTopicsResult = SnsResult<'ListTopics', { topicArns: string[]; nextToken?: string }>;

export type SubscribeResult = SnsResult<
  'Subscribe',
  { subscriptionArn: string; pendingConfirmation: boolean }
>;

export type ConfirmSubscriptionResult = SnsResult<'ConfirmSubscription', { subscriptionArn: string }>;

export type UnsubscribeResult = SnsResult<'Unsubscribe', { success: true }>;

export type ListSubscriptionsResult = SnsResult<
  'ListSubscriptions' | 'ListSubscriptionsByTopic',
  { subscriptions: SubscriptionRow[]; nextToken?: string }
>;

export type GetSubscriptionAttributesResult = SnsResult<
  'GetSubscriptionAttributes',
  { attributes: Record<string, string> }
>;

export type SetSubscriptionAttributesResult = SnsResult<
  'SetSubscriptionAttributes',
  { success: true; attributeName: string }
>;

export type PublishResult = SnsResult<'Publish', { messageId: string; sequenceNumber?: string }>;

export type AddPermissionResult = SnsResult<'AddPermission', { success: true }>;

export type RemovePermissionResult = SnsResult<'RemovePermission', { success: true }>;
