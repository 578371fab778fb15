import {
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { JobsService } from './jobs.service';
import { ReprocessQueryDto } from './dto/reprocess-query.dto';
import { ReprocessResponseDto } from './dto/reprocess-response.dto';

@Controller('content')
export class ContentReprocessController {
  constructor(private readonly jobsService: JobsService) {}

  /**
   * POST /content/:contentId/reprocess?force=&tier=
   *
   * Optional `Idempotency-Key` header: a repeated key returns the job
   * created by the first request.
   *
   * Error responses:
   *   400: Invalid id, tier, idempotency key or source URL
   *   404: Unknown content
   *   500: Job store unavailable
   */
  @Post(':contentId/reprocess')
  @HttpCode(HttpStatus.OK)
  reprocess(
    @Param('contentId', ParseUUIDPipe) contentId: string,
    @Query() query: ReprocessQueryDto,
    @Headers('idempotency-key') idempotencyKey?: string,
  ): Promise<ReprocessResponseDto> {
    return this.jobsService.reprocess(contentId, query, idempotencyKey);
  }
}
