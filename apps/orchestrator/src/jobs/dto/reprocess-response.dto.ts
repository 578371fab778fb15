export type ReprocessStatus = 'submitted' | 'already_active' | 'already_completed';

/** Response body for POST /content/:contentId/reprocess */
export class ReprocessResponseDto {
  /** null when nothing was submitted (already_completed) */
  job_id!: string | null;
  content_id!: string;
  status!: ReprocessStatus;
}
