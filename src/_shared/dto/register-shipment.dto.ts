import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { ScalarValue } from '../../core';
import { IsScalarRecord } from './validators';

/**
 * DTO for registering a shipment
 */
export class RegisterShipmentDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  trackingCode!: string;

  @IsString()
  @IsNotEmpty()
  carrier!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  invoiceNumber?: string;

  /**
   * Recipient or sender tax id; pairs with invoiceNumber
   */
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  document?: string;

  @IsOptional()
  @IsScalarRecord()
  attributes?: Record<string, ScalarValue>;
}
