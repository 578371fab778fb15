import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { JobsService } from './jobs.service';
import { GetJobQueryDto } from './dto/get-job-query.dto';
import { ListJobsQueryDto } from './dto/list-jobs-query.dto';
import {
  CancelJobResponseDto,
  JobDetailResponseDto,
  JobListResponseDto,
  JobStatusResponseDto,
} from './dto/job-response.dto';
import { DriftReportResponseDto } from './dto/drift-report-response.dto';

/**
 * REST controller for pipeline jobs.
 *
 * Routes:
 *   GET  /jobs                : List jobs (content_id, status, limit, offset)
 *   GET  /jobs/drift          : Pipeline version drift across content
 *   GET  /jobs/:jobId         : Job status; ?verbose=true adds full detail
 *   POST /jobs/:jobId/cancel  : Cancel a pending or processing job
 */
@Controller('jobs')
export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  @Get()
  listJobs(@Query() query: ListJobsQueryDto): Promise<JobListResponseDto> {
    return this.jobsService.listJobs(query);
  }

  // Declared before :jobId so "drift" is not parsed as an id
  @Get('drift')
  driftReport(): Promise<DriftReportResponseDto> {
    return this.jobsService.driftReport();
  }

  @Get(':jobId')
  getJob(
    @Param('jobId', ParseUUIDPipe) jobId: string,
    @Query() query: GetJobQueryDto,
  ): Promise<JobStatusResponseDto | JobDetailResponseDto> {
    return this.jobsService.getJob(jobId, query.verbose);
  }

  /**
   * Error responses:
   *   400: jobId is not a UUID
   *   404: Unknown job
   */
  @Post(':jobId/cancel')
  @HttpCode(HttpStatus.OK)
  cancelJob(
    @Param('jobId', ParseUUIDPipe) jobId: string,
  ): Promise<CancelJobResponseDto> {
    return this.jobsService.cancelJob(jobId);
  }
}
