/**
 * Value allowed inside a result summary or job metadata.
 *
 * Summaries are deliberately flat: they are mirrored onto the content
 * record and embedded in webhook payloads, so nested documents belong
 * to the processor's own storage.
 */
export type SummaryValue = string | number | boolean | null | string[];

/** Compact result returned by a processor for one job. */
export type ResultSummary = Record<string, SummaryValue>;

/** Diagnostic detail kept on FULL-tier jobs. */
export type JobMetadata = Record<string, string | number | boolean | null>;
