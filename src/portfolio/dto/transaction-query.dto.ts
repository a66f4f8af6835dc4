import { Type } from 'class-transformer';
import { IsEnum, IsIn, IsInt, IsOptional, IsString, Matches, Max, Min } from 'class-validator';
import { EventKind } from '../../ledger/entities/ledger-event.entity';
import { ISO_DATE_PATTERN } from './backfill-prices.dto';

export class TransactionQueryDto {
  @IsOptional()
  @IsString()
  symbol?: string;

  @IsOptional()
  @IsEnum(EventKind)
  kind?: EventKind;

  @IsOptional()
  @Matches(ISO_DATE_PATTERN, { message: 'from must be YYYY-MM-DD' })
  from?: string;

  @IsOptional()
  @Matches(ISO_DATE_PATTERN, { message: 'to must be YYYY-MM-DD' })
  to?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  limit?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number;
}

export class HoldingsQueryDto {
  @IsOptional()
  @IsIn(['live', 'none'])
  valuation?: 'live' | 'none';
}
