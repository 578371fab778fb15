export class StaleVersionDto {
  version!: string;
  count!: number;
}

/** Response body for GET /jobs/drift */
export class DriftReportResponseDto {
  current_version!: string;

  /** Versions whose major/minor differ from current_version, largest first */
  stale_content!: StaleVersionDto[];
  total_stale!: number;

  /** Content with no version or a non MAJOR.MINOR.PATCH one */
  unknown_version_count!: number;
  total_content!: number;
}
