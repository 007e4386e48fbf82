import { ValidationOptions, registerDecorator } from 'class-validator';
import { isJsonObject, isScalarValue } from '../../core';

/**
 * Object whose values are all string, number, boolean or null
 */
export function IsScalarRecord(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string): void {
    registerDecorator({
      name: 'isScalarRecord',
      target: object.constructor,
      propertyName,
      options: validationOptions,
      validator: {
        validate(value: unknown): boolean {
          return isJsonObject(value) && Object.values(value).every(isScalarValue);
        },
        defaultMessage(): string {
          return `${propertyName} must map keys to string, number, boolean or null`;
        },
      },
    });
  };
}

/**
 * Object whose values are all strings (HTTP headers)
 */
export function IsStringRecord(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string): void {
    registerDecorator({
      name: 'isStringRecord',
      target: object.constructor,
      propertyName,
      options: validationOptions,
      validator: {
        validate(value: unknown): boolean {
          return (
            isJsonObject(value) &&
            Object.values(value).every((entry) => typeof entry === 'string')
          );
        },
        defaultMessage(): string {
          return `${propertyName} must map header names to strings`;
        },
      },
    });
  };
}
