/**
 * Standardized SNS operations wrapper with consistent error handling and metrics
 */

import { MetricUnit } from '@aws-lambda-powertools/metrics';
import { ApiError } from '../utils/error-handling/errors';
import { AwsHttpClient } from './aws-http-client';
import { serializeMessage } from './message';
import {
  AddPermissionParams,
  ConfirmSubscriptionParams,
  CreateTopicParams,
  ListSubscriptionsParams,
  ListTopicsParams,
  PublishParams,
  RemovePermissionParams,
  SUBSCRIPTION_ATTRIBUTE_NAMES,
  SubscribeParams,
  SubscriptionAttributes,
  TOPIC_ATTRIBUTE_NAMES,
  TopicAttributes,
  validateAddPermission,
  validateArn,
  validateConfirmSubscription,
  validateCreateTopic,
  validatePublish,
  validateRemovePermission,
  validateSingleAttribute,
  validateSubscribe,
} from './operation-params';
import {
  buildQueryParams,
  flattenEntries,
  flattenMembers,
  flattenMessageAttributes,
  flattenTags,
} from './query-params';
import { readEntries, readIdentifier, readMembers } from './response-parser';
import {
  AddPermissionResult,
  ConfirmSubscriptionResult,
  CreateTopicResult,
  DeleteTopicResult,
  GetSubscriptionAttributesResult,
  GetTopicAttributesResult,
  ListSubscriptionsResult,
  ListTopicsResult,
  PENDING_CONFIRMATION,
  PublishResult,
  RemovePermissionResult,
  SetSubscriptionAttributesResult,
  SetTopicAttributesResult,
  SubscribeResult,
  SubscriptionRow,
  UnsubscribeResult,
} from './types';
import { AwsWrapperConfig, createAwsOperationExecutor } from './wrapper-base';

function requireText(xml: string, tag: string, action: string, requestId: string): string {
  const value = readIdentifier(xml, tag);
  if (!value) {
    throw new ApiError({
      code: 'MalformedResponse',
      message: `${action} response is missing ${tag}`,
      requestId,
      statusCode: 200,
    });
  }
  return value;
}

function optionalText(xml: string, tag: string): string | undefined {
  const value = readIdentifier(xml, tag);
  return value ? value : undefined;
}

function toSubscriptionRow(memberXml: string): SubscriptionRow {
  return {
    endpoint: readIdentifier(memberXml, 'Endpoint') ?? '',
    owner: readIdentifier(memberXml, 'Owner') ?? '',
    protocol: readIdentifier(memberXml, 'Protocol') ?? '',
    subscriptionArn: readIdentifier(memberXml, 'SubscriptionArn') ?? '',
    topicArn: readIdentifier(memberXml, 'TopicArn') ?? '',
  };
}

/**
 * Standardized SNS operations wrapper
 */
export function createSnsWrapper(httpClient: AwsHttpClient, config: AwsWrapperConfig) {
  const executeSnsOperation = createAwsOperationExecutor('SNS', config);

  return {
    async createTopic(params: CreateTopicParams): Promise<CreateTopicResult> {
      validateCreateTopic(params);

      return executeSnsOperation(
        async () => {
          const { requestId, result } = await httpClient.sendQuery(
            'CreateTopic',
            buildQueryParams(
              'CreateTopic',
              { Name: params.name },
              flattenEntries('Attributes', params.attributes ?? {}),
              flattenTags(params.tags ?? {})
            )
          );

          return {
            kind: 'CreateTopic' as const,
            requestId,
            topicArn: requireText(result, 'TopicArn', 'CreateTopic', requestId),
          };
        },
        'CreateTopic',
        { topicName: params.name }
      );
    },

    async deleteTopic(topicArn: string): Promise<DeleteTopicResult> {
      validateArn(topicArn, 'topicArn');

      return executeSnsOperation(
        async () => {
          const { requestId } = await httpClient.sendQuery(
            'DeleteTopic',
            buildQueryParams('DeleteTopic', { TopicArn: topicArn })
          );
          return { kind: 'DeleteTopic' as const, requestId, success: true as const };
        },
        'DeleteTopic',
        { topicArn }
      );
    },

    async setTopicAttributes(
      topicArn: string,
      attributes: TopicAttributes
    ): Promise<SetTopicAttributesResult> {
      validateArn(topicArn, 'topicArn');
      const attribute = validateSingleAttribute(attributes, TOPIC_ATTRIBUTE_NAMES, 'attributes');

      return executeSnsOperation(
        async () => {
          const { requestId } = await httpClient.sendQuery(
            'SetTopicAttributes',
            buildQueryParams('SetTopicAttributes', {
              TopicArn: topicArn,
              AttributeName: attribute.name,
              AttributeValue: attribute.value,
            })
          );
          return {
            kind: 'SetTopicAttributes' as const,
            requestId,
            success: true as const,
            attributeName: attribute.name,
          };
        },
        'SetTopicAttributes',
        { topicArn, attributeName: attribute.name }
      );
    },

    async getTopicAttributes(topicArn: string): Promise<GetTopicAttributesResult> {
      validateArn(topicArn, 'topicArn');

      return executeSnsOperation(
        async () => {
          const { requestId, result } = await httpClient.sendQuery(
            'GetTopicAttributes',
            buildQueryParams('GetTopicAttributes', { TopicArn: topicArn })
          );
          return {
            kind: 'GetTopicAttributes' as const,
            requestId,
            attributes: readEntries(result, 'Attributes'),
          };
        },
        'GetTopicAttributes',
        { topicArn }
      );
    },

    async listTopics(params: ListTopicsParams = {}): Promise<ListTopicsResult> {
      return executeSnsOperation(
        async () => {
          const { requestId, result } = await httpClient.sendQuery(
            'ListTopics',
            buildQueryParams('ListTopics', { NextToken: params.nextToken })
          );
          return {
            kind: 'ListTopics' as const,
            requestId,
            topicArns: readMembers(result, 'Topics').map(
              (member) => readIdentifier(member, 'TopicArn') ?? ''
            ),
            nextToken: optionalText(result, 'NextToken'),
          };
        },
        'ListTopics',
        { hasNextToken: params.nextToken !== undefined }
      );
    },

    async subscribe(params: SubscribeParams): Promise<SubscribeResult> {
      validateSubscribe(params);

      return executeSnsOperation(
        async () => {
          const { requestId, result } = await httpClient.sendQuery(
            'Subscribe',
            buildQueryParams(
              'Subscribe',
              {
                TopicArn: params.topicArn,
                Protocol: params.protocol,
                Endpoint: params.endpoint,
                ReturnSubscriptionArn: params.returnSubscriptionArn,
              },
              flattenEntries('Attributes', params.attributes ?? {})
            )
          );
          const subscriptionArn = requireText(result, 'SubscriptionArn', 'Subscribe', requestId);

          return {
            kind: 'Subscribe' as const,
            requestId,
            subscriptionArn,
            pendingConfirmation: subscriptionArn.toLowerCase() === PENDING_CONFIRMATION,
          };
        },
        'Subscribe',
        { topicArn: params.topicArn, protocol: params.protocol }
      );
    },

    async confirmSubscription(
      params: ConfirmSubscriptionParams
    ): Promise<ConfirmSubscriptionResult> {
      validateConfirmSubscription(params);

      return executeSnsOperation(
        async () => {
          const { requestId, result } = await httpClient.sendQuery(
            'ConfirmSubscription',
            buildQueryParams('ConfirmSubscription', {
              TopicArn: params.topicArn,
              Token: params.token,
              AuthenticateOnUnsubscribe: params.authenticateOnUnsubscribe,
            })
          );
          return {
            kind: 'ConfirmSubscription' as const,
            requestId,
            subscriptionArn: requireText(result, 'SubscriptionArn', 'ConfirmSubscription', requestId),
          };
        },
        'ConfirmSubscription',
        { topicArn: params.topicArn }
      );
    },

    async unsubscribe(subscriptionArn: string): Promise<UnsubscribeResult> {
      validateArn(subscriptionArn, 'subscriptionArn');

      return executeSnsOperation(
        async () => {
          const { requestId } = await httpClient.sendQuery(
            'Unsubscribe',
            buildQueryParams('Unsubscribe', { SubscriptionArn: subscriptionArn })
          );
          return { kind: 'Unsubscribe' as const, requestId, success: true as const };
        },
        'Unsubscribe',
        { subscriptionArn }
      );
    },

    async listSubscriptions(params: ListSubscriptionsParams = {}): Promise<ListSubscriptionsResult> {
      const action = params.topicArn ? 'ListSubscriptionsByTopic' : 'ListSubscriptions';

      return executeSnsOperation(
        async () => {
          const { requestId, result } = await httpClient.sendQuery(
            action,
            buildQueryParams(action, {
              TopicArn: params.topicArn || undefined,
              NextToken: params.nextToken,
            })
          );
          return {
            kind: action,
            requestId,
            subscriptions: readMembers(result, 'Subscriptions').map(toSubscriptionRow),
            nextToken: optionalText(result, 'NextToken'),
          };
        },
        action,
        { topicArn: params.topicArn, hasNextToken: params.nextToken !== undefined }
      );
    },

    async getSubscriptionAttributes(
      subscriptionArn: string
    ): Promise<GetSubscriptionAttributesResult> {
      validateArn(subscriptionArn, 'subscriptionArn');

      return executeSnsOperation(
        async () => {
          const { requestId, result } = await httpClient.sendQuery(
            'GetSubscriptionAttributes',
            buildQueryParams('GetSubscriptionAttributes', { SubscriptionArn: subscriptionArn })
          );
          return {
            kind: 'GetSubscriptionAttributes' as const,
            requestId,
            attributes: readEntries(result, 'Attributes'),
          };
        },
        'GetSubscriptionAttributes',
        { subscriptionArn }
      );
    },

    async setSubscriptionAttributes(
      subscriptionArn: string,
      attributes: SubscriptionAttributes
    ): Promise<SetSubscriptionAttributesResult> {
      validateArn(subscriptionArn, 'subscriptionArn');
      const attribute = validateSingleAttribute(
        attributes,
        SUBSCRIPTION_ATTRIBUTE_NAMES,
        'attributes'
      );

      return executeSnsOperation(
        async () => {
          const { requestId } = await httpClient.sendQuery(
            'SetSubscriptionAttributes',
            buildQueryParams('SetSubscriptionAttributes', {
              SubscriptionArn: subscriptionArn,
              AttributeName: attribute.name,
              AttributeValue: attribute.value,
            })
          );
          return {
            kind: 'SetSubscriptionAttributes' as const,
            requestId,
            success: true as const,
            attributeName: attribute.name,
          };
        },
        'SetSubscriptionAttributes',
        { subscriptionArn, attributeName: attribute.name }
      );
    },

    async publish(params: PublishParams): Promise<PublishResult> {
      validatePublish(params);
      const message = serializeMessage(params.message);

      return executeSnsOperation(
        async () => {
          const { requestId, result } = await httpClient.sendQuery(
            'Publish',
            buildQueryParams(
              'Publish',
              {
                TopicArn: params.topicArn,
                TargetArn: params.targetArn,
                PhoneNumber: params.phoneNumber,
                Message: message.Message,
                MessageStructure: message.MessageStructure,
                Subject: params.subject,
                MessageGroupId: params.messageGroupId,
                MessageDeduplicationId: params.messageDeduplicationId,
              },
              flattenMessageAttributes(params.messageAttributes ?? {})
            )
          );

          config.metrics?.addMetric(
            'SNSPublishSize',
            MetricUnit.Bytes,
            Buffer.byteLength(message.Message, 'utf8')
          );

          return {
            kind: 'Publish' as const,
            requestId,
            messageId: requireText(result, 'MessageId', 'Publish', requestId),
            sequenceNumber: optionalText(result, 'SequenceNumber'),
          };
        },
        'Publish',
        {
          topicArn: params.topicArn,
          targetArn: params.targetArn,
          hasPhoneNumber: params.phoneNumber !== undefined,
          messageStructure: message.MessageStructure ?? 'raw',
        }
      );
    },

    async addPermission(params: AddPermissionParams): Promise<AddPermissionResult> {
      validateAddPermission(params);

      return executeSnsOperation(
        async () => {
          const { requestId } = await httpClient.sendQuery(
            'AddPermission',
            buildQueryParams(
              'AddPermission',
              { TopicArn: params.topicArn, Label: params.label },
              flattenMembers('AWSAccountId', params.accountIds),
              flattenMembers('ActionName', params.actions)
            )
          );
          return { kind: 'AddPermission' as const, requestId, success: true as const };
        },
        'AddPermission',
        {
          topicArn: params.topicArn,
          label: params.label,
          accountCount: params.accountIds.length,
          actions: params.actions.join(', '),
        }
      );
    },

    async removePermission(params: RemovePermissionParams): Promise<RemovePermissionResult> {
      validateRemovePermission(params);

      return executeSnsOperation(
        async () => {
          const { requestId } = await httpClient.sendQuery(
            'RemovePermission',
            buildQueryParams('RemovePermission', {
              TopicArn: params.topicArn,
              Label: params.label,
            })
          );
          return { kind: 'RemovePermission' as const, requestId, success: true as const };
        },
        'RemovePermission',
        { topicArn: params.topicArn, label: params.label }
      );
    },
  };
}

export type SnsWrapper = ReturnType<typeof createSnsWrapper>;
