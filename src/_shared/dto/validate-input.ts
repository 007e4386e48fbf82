import { BadRequestException } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validate } from 'class-validator';
import { isJsonObject } from '../../core';

function describeErrors(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...describeErrors(error.children ?? [], path)];
  });
}

/**
 * Run class-validator on an already built DTO instance
 */
export async function assertValid(instance: object): Promise<void> {
  const errors = await validate(instance);
  if (errors.length > 0) {
    throw new BadRequestException(describeErrors(errors));
  }
}

/**
 * Transform a plain object into the DTO class and validate it
 */
export async function validateInput<T extends object>(
  cls: ClassConstructor<T>,
  input: unknown,
): Promise<T> {
  if (!isJsonObject(input)) {
    throw new BadRequestException(`${cls.name} must be an object`);
  }

  const instance = plainToInstance(cls, input);
  await assertValid(instance);
  return instance;
}
