import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  IsUUID,
  Matches,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// Either transactionId, or symbol + date + quantity.
export class PriceEntryDto {
  @IsOptional()
  @IsUUID('4')
  transactionId?: string;

  @ValidateIf((entry: PriceEntryDto) => entry.transactionId === undefined)
  @IsString()
  @IsNotEmpty()
  symbol?: string;

  @ValidateIf((entry: PriceEntryDto) => entry.transactionId === undefined)
  @Matches(ISO_DATE_PATTERN, { message: 'date must be YYYY-MM-DD' })
  date?: string;

  @ValidateIf((entry: PriceEntryDto) => entry.transactionId === undefined)
  @IsInt()
  @IsPositive()
  quantity?: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  unitPrice!: number;

  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  fees?: number;                   // SELL rows only
}

export class BackfillPricesDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => PriceEntryDto)
  entries!: PriceEntryDto[];
}
