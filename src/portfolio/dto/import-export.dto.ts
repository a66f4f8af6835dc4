import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { RowOrder } from '../../ledger/classifier/event-classifier';

// Broker export posted as CSV text.
// rowOrder overrides IMPORT_ROW_ORDER for this file only.
export class ImportExportDto {
  @IsString()
  @IsNotEmpty()
  csv!: string;

  @IsOptional()
  @IsIn(['oldest-first', 'newest-first'])
  rowOrder?: RowOrder;
}
