/**
 * Shared validation utilities and patterns
 * Used to check operation parameters before anything is sent over the wire
 */

import { ParameterValidationError } from './error-handling/errors';

/**
 * Standard validation result type
 */
export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

/**
 * Validate that a required field is present and not empty
 */
export function validateRequired(value: unknown, fieldName: string): string | null {
  if (value === null || value === undefined || value === '') {
    return `${fieldName} is required`;
  }
  return null;
}

/**
 * Validate that a value is one of the allowed options
 */
export function validateEnum<T extends string>(
  value: string,
  allowedValues: readonly T[],
  fieldName: string
): string | null {
  if (!isOneOf(value, allowedValues)) {
    return `${fieldName} must be one of: ${allowedValues.join(', ')}`;
  }
  return null;
}

/**
 * Validate that a string matches a pattern
 */
export function validatePattern(
  value: string,
  pattern: RegExp,
  fieldName: string,
  description: string
): string | null {
  if (!pattern.test(value)) {
    return `${fieldName} must be ${description}`;
  }
  return null;
}

/**
 * Validate that every key of a map is one of the recognized keys
 */
export function validateKnownKeys(
  map: object,
  allowedKeys: readonly string[],
  fieldName: string
): string | null {
  const unknownKeys = Object.keys(map).filter((key) => !allowedKeys.includes(key));
  if (unknownKeys.length > 0) {
    return `${fieldName} has unrecognized keys: ${unknownKeys.join(', ')} (allowed: ${allowedKeys.join(', ')})`;
  }
  return null;
}

/**
 * Validate that an array is not empty
 */
export function validateNonEmptyArray(value: readonly unknown[], fieldName: string): string | null {
  if (value.length === 0) {
    return `${fieldName} must contain at least one value`;
  }
  return null;
}

export function isOneOf<T extends string>(value: string, allowedValues: readonly T[]): value is T {
  return allowedValues.some((allowed) => allowed === value);
}

/**
 * Helper function to collect validation errors from multiple validators
 */
export function collectValidationErrors(...errorChecks: (string | null)[]): string[] {
  return errorChecks.filter((error): error is string => error !== null);
}

/**
 * Builder pattern for validation with fluent interface
 */
class ValidationBuilder {
  private errors: string[] = [];

  required(value: unknown, fieldName: string): ValidationBuilder {
    return this.push(validateRequired(value, fieldName));
  }

  enum<T extends string>(
    value: string,
    allowedValues: readonly T[],
    fieldName: string
  ): ValidationBuilder {
    return this.push(validateEnum(value, allowedValues, fieldName));
  }

  pattern(value: string, pattern: RegExp, fieldName: string, description: string): ValidationBuilder {
    return this.push(validatePattern(value, pattern, fieldName, description));
  }

  knownKeys(
    map: object,
    allowedKeys: readonly string[],
    fieldName: string
  ): ValidationBuilder {
    return this.push(validateKnownKeys(map, allowedKeys, fieldName));
  }

  nonEmpty(value: readonly unknown[], fieldName: string): ValidationBuilder {
    return this.push(validateNonEmptyArray(value, fieldName));
  }

  custom(validationFn: () => string | null): ValidationBuilder {
    return this.push(validationFn());
  }

  build(): ValidationResult {
    return {
      isValid: this.errors.length === 0,
      errors: [...this.errors],
    };
  }

  /**
   * Throw a ParameterValidationError carrying every collected error
   */
  assert(): void {
    if (this.errors.length > 0) {
      throw new ParameterValidationError([...this.errors]);
    }
  }

  private push(error: string | null): ValidationBuilder {
    if (error) {
      this.errors.push(error);
    }
    return this;
  }
}

/**
 * Create a new validation builder instance
 */
export function createValidator(): ValidationBuilder {
  return new ValidationBuilder();
}
