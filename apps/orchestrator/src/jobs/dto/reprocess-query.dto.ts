import { IsBoolean, IsEnum, IsOptional } from 'class-validator';
import { DataTier } from '@jobflow/database';
import { BooleanQuery } from './boolean-query.transform';

export class ReprocessQueryDto {
  /** Reprocess even when the content already completed */
  @BooleanQuery()
  @IsBoolean()
  force: boolean = false;

  /** Retention tier of the new job; defaults to PIPELINE_DEFAULT_DATA_TIER */
  @IsOptional()
  @IsEnum(DataTier)
  tier?: DataTier;
}
