/**
 * Parameter structs of every SNS operation, with the recognized keys of each loose map
 */

import { createValidator } from '../utils/validation';
import { SnsMessage } from './message';
import { MessageAttributeValue } from './query-params';

export const TOPIC_ATTRIBUTE_NAMES = [
  'DisplayName',
  'Policy',
  'DeliveryPolicy',
  'KmsMasterKeyId',
  'SignatureVersion',
  'TracingConfig',
  'ContentBasedDeduplication',
] as const;

/** FifoTopic can only be given when the topic is created */
export const CREATE_TOPIC_ATTRIBUTE_NAMES = [...TOPIC_ATTRIBUTE_NAMES, 'FifoTopic'] as const;

export const SUBSCRIPTION_ATTRIBUTE_NAMES = [
  'DeliveryPolicy',
  'FilterPolicy',
  'FilterPolicyScope',
  'RawMessageDelivery',
  'RedrivePolicy',
  'SubscriptionRoleArn',
] as const;

export const SUBSCRIPTION_PROTOCOLS = [
  'http',
  'https',
  'email',
  'email-json',
  'sms',
  'sqs',
  'application',
  'lambda',
  'firehose',
] as const;

export const PERMISSION_ACTIONS = [
  'AddPermission',
  'ConfirmSubscription',
  'DeleteTopic',
  'GetTopicAttributes',
  'ListSubscriptionsByTopic',
  'Publish',
  'Receive',
  'RemovePermission',
  'SetTopicAttributes',
  'Subscribe',
] as const;

export const MESSAGE_ATTRIBUTE_DATA_TYPES = ['String', 'String.Array', 'Number', 'Binary'] as const;

export type TopicAttributeName = (typeof TOPIC_ATTRIBUTE_NAMES)[number];
export type CreateTopicAttributeName = (typeof CREATE_TOPIC_ATTRIBUTE_NAMES)[number];
export type SubscriptionAttributeName = (typeof SUBSCRIPTION_ATTRIBUTE_NAMES)[number];
export type SubscriptionProtocol = (typeof SUBSCRIPTION_PROTOCOLS)[number];
export type PermissionAction = (typeof PERMISSION_ACTIONS)[number];

export type TopicAttributes = Partial<Record<TopicAttributeName, string>>;
export type CreateTopicAttributes = Partial<Record<CreateTopicAttributeName, string>>;
export type SubscriptionAttributes = Partial<Record<SubscriptionAttributeName, string>>;

// 256 characters at most, .fifo suffix included
const TOPIC_NAME_PATTERN = /^(?=.{1,256}$)[A-Za-z0-9_-]+(\.fifo)?$/;
const ACCOUNT_ID_PATTERN = /^\d{12}$/;
const PERMISSION_LABEL_PATTERN = /^[A-Za-z0-9_-]{1,100}$/;
const MESSAGE_ATTRIBUTE_NAME_PATTERN = /^[A-Za-z0-9_.-]{1,256}$/;

export interface CreateTopicParams {
  name: string;
  attributes?: CreateTopicAttributes;
  tags?: Record<string, string>;
}

export interface SubscribeParams {
  topicArn: string;
  protocol: SubscriptionProtocol;
  endpoint: string;
  attributes?: SubscriptionAttributes;
  /** Ask the service for the subscription ARN even before the endpoint confirms */
  returnSubscriptionArn?: boolean;
}

export interface ConfirmSubscriptionParams {
  topicArn: string;
  token: string;
  authenticateOnUnsubscribe?: boolean;
}

export interface ListSubscriptionsParams {
  /** Only list the subscriptions of this topic */
  topicArn?: string;
  nextToken?: string;
}

export interface ListTopicsParams {
  nextToken?: string;
}

interface PublishTarget {
  topicArn?: string;
  targetArn?: string;
  phoneNumber?: string;
}

export interface PublishParams extends PublishTarget {
  message: SnsMessage;
  subject?: string;
  messageAttributes?: Record<string, MessageAttributeValue>;
  /** FIFO topics only */
  messageGroupId?: string;
  /** FIFO topics only */
  messageDeduplicationId?: string;
}

export interface AddPermissionParams {
  topicArn: string;
  label: string;
  accountIds: string[];
  actions: PermissionAction[];
}

export interface RemovePermissionParams {
  topicArn: string;
  label: string;
}

/**
 * Validate a map that sets exactly one attribute and return that attribute
 */
export function validateSingleAttribute<TName extends string>(
  attributes: Partial<Record<TName, string>>,
  allowedNames: readonly TName[],
  fieldName: string
): { name: TName; value: string } {
  const provided = allowedNames.flatMap((name) => {
    const value = attributes[name];
    return value === undefined ? [] : [{ name, value }];
  });

  createValidator()
    .knownKeys(attributes, allowedNames, fieldName)
    .custom(() =>
      provided.length === 1
        ? null
        : `${fieldName} must set exactly one attribute per call (got ${provided.length})`
    )
    .assert();

  return provided[0];
}

export function validateCreateTopic(params: CreateTopicParams): void {
  createValidator()
    .required(params.name, 'name')
    .pattern(
      params.name,
      TOPIC_NAME_PATTERN,
      'name',
      'up to 256 characters of letters, digits, hyphens or underscores, optionally ending in .fifo'
    )
    .knownKeys(params.attributes ?? {}, CREATE_TOPIC_ATTRIBUTE_NAMES, 'attributes')
    .assert();
}

export function validateSubscribe(params: SubscribeParams): void {
  createValidator()
    .required(params.topicArn, 'topicArn')
    .required(params.endpoint, 'endpoint')
    .enum(params.protocol, SUBSCRIPTION_PROTOCOLS, 'protocol')
    .knownKeys(params.attributes ?? {}, SUBSCRIPTION_ATTRIBUTE_NAMES, 'attributes')
    .assert();
}

export function validateConfirmSubscription(params: ConfirmSubscriptionParams): void {
  createValidator()
    .required(params.topicArn, 'topicArn')
    .required(params.token, 'token')
    .assert();
}

export function validatePublish(params: PublishParams): void {
  const targets = [params.topicArn, params.targetArn, params.phoneNumber].filter(
    (target) => target !== undefined && target !== ''
  );
  const validator = createValidator()
    .custom(() =>
      targets.length === 1
        ? null
        : 'exactly one of topicArn, targetArn or phoneNumber is required'
    )
    .custom(() =>
      params.subject === undefined || params.subject.length > 0
        ? null
        : 'subject must not be empty when given'
    );

  for (const [name, value] of Object.entries(params.messageAttributes ?? {})) {
    validator
      .pattern(name, MESSAGE_ATTRIBUTE_NAME_PATTERN, `messageAttributes name "${name}"`, 'a valid attribute name')
      .enum(value.dataType, MESSAGE_ATTRIBUTE_DATA_TYPES, `messageAttributes.${name}.dataType`);
  }

  validator.assert();
}

export function validateAddPermission(params: AddPermissionParams): void {
  const validator = createValidator()
    .required(params.topicArn, 'topicArn')
    .pattern(
      params.label,
      PERMISSION_LABEL_PATTERN,
      'label',
      '1-100 letters, digits, hyphens or underscores'
    )
    .nonEmpty(params.accountIds, 'accountIds')
    .nonEmpty(params.actions, 'actions');

  for (const accountId of params.accountIds) {
    validator.pattern(accountId, ACCOUNT_ID_PATTERN, `accountId "${accountId}"`, 'a 12-digit AWS account id');
  }
  for (const action of params.actions) {
    validator.enum(action, PERMISSION_ACTIONS, `action "${action}"`);
  }

  validator.assert();
}

export function validateRemovePermission(params: RemovePermissionParams): void {
  createValidator()
    .required(params.topicArn, 'topicArn')
    .pattern(
      params.label,
      PERMISSION_LABEL_PATTERN,
      'label',
      '1-100 letters, digits, hyphens or underscores'
    )
    .assert();
}

export function validateArn(value: string, fieldName: string): void {
  createValidator().required(value, fieldName).assert();
}
