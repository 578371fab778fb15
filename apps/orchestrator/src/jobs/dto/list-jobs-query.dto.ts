import { IsIn, IsInt, IsOptional, IsUUID, Max, Min } from 'class-validator';
import { JobStatus } from '@jobflow/database';

export class ListJobsQueryDto {
  @IsOptional()
  @IsUUID()
  content_id?: string;

  @IsOptional()
  @IsIn(Object.values(JobStatus), {
    message: `status must be one of: ${Object.values(JobStatus).join(', ')}`,
  })
  status?: JobStatus;

  @IsInt()
  @Min(1)
  @Max(100)
  limit: number = 50;

  @IsInt()
  @Min(0)
  offset: number = 0;
}
