/**
 * Retention classification of a job record.
 *
 * FULL jobs keep verbose diagnostic metadata and are purged early;
 * COMPACT jobs keep only the status history and live longer.
 */
export enum DataTier {
  COMPACT = 'compact',
  FULL = 'full',
}
