import {
  ArrayNotEmpty,
  Equals,
  IsArray,
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Min,
  ValidateNested,
} from 'class-validator';
import { BadRequestException } from '@nestjs/common';
import { Type } from 'class-transformer';
import {
  AutomationAction,
  CanonicalStatus,
  RuleCondition,
  ScalarValue,
  isConditionField,
  isScalarValue,
} from '../../core';
import { IsStringRecord } from './validators';

export class NotifyActionDto {
  @Equals('notify')
  type!: 'notify';

  @IsString()
  @IsNotEmpty()
  channel!: string;

  @IsString()
  @IsNotEmpty()
  template!: string;

  @IsOptional()
  @IsString()
  recipient?: string;
}

export class WebhookActionDto {
  @Equals('webhook')
  type!: 'webhook';

  @IsUrl({ require_tld: false, protocols: ['http', 'https'] })
  url!: string;

  @IsOptional()
  @IsIn(['POST', 'PUT'])
  method?: 'POST' | 'PUT';

  @IsOptional()
  @IsStringRecord()
  headers?: Record<string, string>;

  @IsOptional()
  @IsInt()
  @Min(1)
  timeoutMs?: number;
}

export class RuleConditionDto {
  @IsIn(['equals', 'not-equals', 'in', 'exists'])
  op!: RuleCondition['op'];

  @IsString()
  @IsNotEmpty()
  field!: string;

  @IsOptional()
  value?: ScalarValue;

  @IsOptional()
  @IsArray()
  values?: ScalarValue[];
}

/**
 * DTO for defining an automation rule
 */
export class AutomationRuleDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsEnum(CanonicalStatus, { each: true })
  triggerStatuses!: CanonicalStatus[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RuleConditionDto)
  conditions?: RuleConditionDto[];

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => Object, {
    discriminator: {
      property: 'type',
      subTypes: [
        { value: NotifyActionDto, name: 'notify' },
        { value: WebhookActionDto, name: 'webhook' },
      ],
    },
    keepDiscriminatorProperty: true,
  })
  actions!: Array<NotifyActionDto | WebhookActionDto>;

  @IsOptional()
  @IsBoolean()
  enabled?: boolean;
}

/**
 * Narrow a validated condition DTO to the domain union.
 * Throws on combinations the decorators cannot express.
 */
export function toRuleCondition(dto: RuleConditionDto): RuleCondition {
  const { field } = dto;
  if (!isConditionField(field)) {
    throw new BadRequestException(`Unknown condition field: ${field}`);
  }

  switch (dto.op) {
    case 'equals':
      return { op: 'equals', field, value: requireScalar(dto, field) };
    case 'not-equals':
      return { op: 'not-equals', field, value: requireScalar(dto, field) };
    case 'in':
      if (!dto.values || !dto.values.every(isScalarValue)) {
        throw new BadRequestException(`Condition in on ${field} needs a list of scalar values`);
      }
      return { op: 'in', field, values: [...dto.values] };
    case 'exists':
      return { op: 'exists', field };
  }
}

function requireScalar(dto: RuleConditionDto, field: string): ScalarValue {
  if (dto.value === undefined || !isScalarValue(dto.value)) {
    throw new BadRequestException(`Condition ${dto.op} on ${field} needs a scalar value`);
  }
  return dto.value;
}

export function toAutomationAction(
  dto: NotifyActionDto | WebhookActionDto,
): AutomationAction {
  switch (dto.type) {
    case 'notify':
      return {
        type: 'notify',
        channel: dto.channel,
        template: dto.template,
        recipient: dto.recipient,
      };
    case 'webhook':
      return {
        type: 'webhook',
        url: dto.url,
        method: dto.method,
        headers: dto.headers ? { ...dto.headers } : undefined,
        timeoutMs: dto.timeoutMs,
      };
  }
}
