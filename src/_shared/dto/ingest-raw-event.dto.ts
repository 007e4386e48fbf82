import {
  IsDate,
  IsDefined,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export class ShipmentHintDto {
  @IsOptional()
  @IsString()
  shipmentId?: string;

  @IsOptional()
  @IsString()
  trackingCode?: string;

  @IsOptional()
  @IsString()
  invoiceNumber?: string;

  @IsOptional()
  @IsString()
  document?: string;
}

/**
 * Envelope around one raw carrier payload
 */
export class IngestRawEventDto {
  @IsString()
  @IsNotEmpty()
  source!: string;

  /**
   * Carrier payload as received: object, JSON text or bytes
   */
  @IsDefined()
  payload!: unknown;

  @IsOptional()
  @Type(() => Date)
  @IsDate()
  receivedAt?: Date;

  @IsOptional()
  @ValidateNested()
  @Type(() => ShipmentHintDto)
  shipmentHint?: ShipmentHintDto;
}
