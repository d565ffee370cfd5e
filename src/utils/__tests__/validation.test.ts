import { ParameterValidationError } from '../error-handling/errors';
import {
  collectValidationErrors,
  createValidator,
  isOneOf,
  validateEnum,
  validateKnownKeys,
  validateNonEmptyArray,
  validatePattern,
  validateRequired,
} from '../validation';

describe('Validation Utils', () => {
  describe('validateRequired', () => {
    it('should return null for present values', () => {
      expect(validateRequired('arn:aws:sns:us-east-1:123456789012:orders', 'topicArn')).toBeNull();
      expect(validateRequired(0, 'count')).toBeNull();
      expect(validateRequired(false, 'flag')).toBeNull();
    });

    it('should return error for missing values', () => {
      expect(validateRequired(undefined, 'topicArn')).toBe('topicArn is required');
      expect(validateRequired(null, 'topicArn')).toBe('topicArn is required');
      expect(validateRequired('', 'topicArn')).toBe('topicArn is required');
    });
  });

  describe('validateEnum', () => {
    const protocols = ['sqs', 'email'] as const;

    it('should accept allowed values', () => {
      expect(validateEnum('sqs', protocols, 'protocol')).toBeNull();
    });

    it('should list the allowed values on failure', () => {
      expect(validateEnum('pigeon', protocols, 'protocol')).toBe(
        'protocol must be one of: sqs, email'
      );
    });
  });

  describe('validatePattern', () => {
    it('should describe the expected format on failure', () => {
      expect(validatePattern('abc', /^\d+$/, 'accountId', 'numeric')).toBe('accountId must be numeric');
      expect(validatePattern('123', /^\d+$/, 'accountId', 'numeric')).toBeNull();
    });
  });

  describe('validateKnownKeys', () => {
    it('should accept maps with only recognized keys', () => {
      expect(validateKnownKeys({ DisplayName: 'Orders' }, ['DisplayName', 'Policy'], 'attributes')).toBeNull();
      expect(validateKnownKeys({}, ['DisplayName'], 'attributes')).toBeNull();
    });

    it('should name every unrecognized key', () => {
      expect(
        validateKnownKeys({ DisplayName: 'x', Colour: 'red', Size: '1' }, ['DisplayName'], 'attributes')
      ).toBe('attributes has unrecognized keys: Colour, Size (allowed: DisplayName)');
    });
  });

  describe('validateNonEmptyArray', () => {
    it('should reject empty arrays', () => {
      expect(validateNonEmptyArray([], 'accountIds')).toBe('accountIds must contain at least one value');
      expect(validateNonEmptyArray(['123456789012'], 'accountIds')).toBeNull();
    });
  });

  describe('isOneOf', () => {
    it('should narrow to the allowed values', () => {
      expect(isOneOf('Publish', ['Publish', 'Subscribe'])).toBe(true);
      expect(isOneOf('publish', ['Publish', 'Subscribe'])).toBe(false);
    });
  });

  describe('collectValidationErrors', () => {
    it('should drop null results', () => {
      expect(collectValidationErrors(null, 'a is required', null, 'b is required')).toEqual([
        'a is required',
        'b is required',
      ]);
    });
  });

  describe('ValidationBuilder', () => {
    it('should collect errors from every check', () => {
      const result = createValidator()
        .required('', 'topicArn')
        .enum('fax', ['sqs'], 'protocol')
        .nonEmpty([], 'actions')
        .custom(() => null)
        .build();

      expect(result).toEqual({
        isValid: false,
        errors: ['topicArn is required', 'protocol must be one of: sqs', 'actions must contain at least one value'],
      });
    });

    it('should report valid when nothing failed', () => {
      expect(createValidator().required('x', 'name').build()).toEqual({ isValid: true, errors: [] });
    });

    it('should throw ParameterValidationError with all errors on assert', () => {
      let thrown: unknown;
      try {
        createValidator().required(undefined, 'token').required('', 'topicArn').assert();
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ParameterValidationError);
      expect(thrown).toMatchObject({
        code: 'ParameterValidation',
        message: 'token is required; topicArn is required',
        errors: ['token is required', 'topicArn is required'],
      });
    });

    it('should not throw on assert when valid', () => {
      expect(() => createValidator().required('x', 'name').assert()).not.toThrow();
    });
  });
});
