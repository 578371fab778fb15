import { IsBoolean } from 'class-validator';
import { BooleanQuery } from './boolean-query.transform';

export class GetJobQueryDto {
  /** Include error, version and tier detail; the access is audited */
  @BooleanQuery()
  @IsBoolean()
  verbose: boolean = false;
}
