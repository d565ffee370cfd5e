import {
  buildQueryParams,
  encodeQueryBody,
  flattenEntries,
  flattenMembers,
  flattenMessageAttributes,
  flattenTags,
  percentEncode,
} from '../query-params';

describe('Query parameter flattening', () => {
  describe('buildQueryParams', () => {
    it('should add Action and Version and drop undefined values', () => {
      expect(buildQueryParams('CreateTopic', { Name: 'orders', NextToken: undefined })).toEqual({
        Action: 'CreateTopic',
        Version: '2010-03-31',
        Name: 'orders',
      });
    });

    it('should stringify booleans and numbers', () => {
      expect(
        buildQueryParams('Subscribe', { ReturnSubscriptionArn: true, MaxItems: 10 })
      ).toEqual({
        Action: 'Subscribe',
        Version: '2010-03-31',
        ReturnSubscriptionArn: 'true',
        MaxItems: '10',
      });
    });

    it('should merge several groups in order', () => {
      const params = buildQueryParams(
        'AddPermission',
        { TopicArn: 'arn:aws:sns:us-east-1:123456789012:orders' },
        flattenMembers('ActionName', ['Publish'])
      );

      expect(Object.keys(params)).toEqual(['Action', 'Version', 'TopicArn', 'ActionName.member.1']);
    });
  });

  describe('flattenMembers', () => {
    it('should number members from 1', () => {
      expect(flattenMembers('AWSAccountId', ['111122223333', '444455556666'])).toEqual({
        'AWSAccountId.member.1': '111122223333',
        'AWSAccountId.member.2': '444455556666',
      });
    });

    it('should return nothing for an empty list', () => {
      expect(flattenMembers('ActionName', [])).toEqual({});
    });
  });

  describe('flattenEntries', () => {
    it('should emit key/value pairs sorted by key', () => {
      expect(
        flattenEntries('Attributes', { RawMessageDelivery: 'true', FilterPolicy: '{}' })
      ).toEqual({
        'Attributes.entry.1.key': 'FilterPolicy',
        'Attributes.entry.1.value': '{}',
        'Attributes.entry.2.key': 'RawMessageDelivery',
        'Attributes.entry.2.value': 'true',
      });
    });

    it('should skip undefined values', () => {
      expect(flattenEntries('Attributes', { DisplayName: undefined, Policy: 'p' })).toEqual({
        'Attributes.entry.1.key': 'Policy',
        'Attributes.entry.1.value': 'p',
      });
    });
  });

  describe('flattenTags', () => {
    it('should emit Key/Value members sorted by key', () => {
      expect(flattenTags({ team: 'core', env: 'test' })).toEqual({
        'Tags.member.1.Key': 'env',
        'Tags.member.1.Value': 'test',
        'Tags.member.2.Key': 'team',
        'Tags.member.2.Value': 'core',
      });
    });
  });

  describe('flattenMessageAttributes', () => {
    it('should encode string and binary attributes', () => {
      expect(
        flattenMessageAttributes({
          priority: { dataType: 'Number', stringValue: '5' },
          blob: { dataType: 'Binary', binaryValue: Buffer.from('hi') },
        })
      ).toEqual({
        'MessageAttributes.entry.1.Name': 'blob',
        'MessageAttributes.entry.1.Value.DataType': 'Binary',
        'MessageAttributes.entry.1.Value.BinaryValue': 'aGk=',
        'MessageAttributes.entry.2.Name': 'priority',
        'MessageAttributes.entry.2.Value.DataType': 'Number',
        'MessageAttributes.entry.2.Value.StringValue': '5',
      });
    });
  });

  describe('encodeQueryBody', () => {
    it('should percent-encode reserved characters per RFC 3986', () => {
      expect(percentEncode("it's 100% done! (ok)*")).toBe(
        'it%27s%20100%25%20done%21%20%28ok%29%2A'
      );
    });

    it('should join parameters in insertion order', () => {
      expect(
        encodeQueryBody({
          Action: 'Publish',
          TopicArn: 'arn:aws:sns:us-east-1:123456789012:orders',
          Message: 'a+b=c',
        })
      ).toBe(
        'Action=Publish&TopicArn=arn%3Aaws%3Asns%3Aus-east-1%3A123456789012%3Aorders&Message=a%2Bb%3Dc'
      );
    });
  });
});
