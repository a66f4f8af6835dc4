import { ArrayMaxSize, IsArray, IsDateString, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString } from 'class-validator';

// Manual quote for a single symbol
export class UpdateQuoteDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  price!: number;

  @IsOptional()
  @IsDateString()
  asOf?: string;
}

// Omit symbols to sync every held symbol
export class SyncQuotesDto {
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(500)
  @IsString({ each: true })
  symbols?: string[];
}
