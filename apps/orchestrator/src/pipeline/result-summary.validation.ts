import { ResultSummary, SummaryValue } from '@jobflow/database';

function isSummaryValue(value: unknown): value is SummaryValue {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    default:
      return (
        Array.isArray(value) && value.every((item) => typeof item === 'string')
      );
  }
}

/** Flat object of strings, finite numbers, booleans, nulls and string arrays */
export function isResultSummary(value: unknown): value is ResultSummary {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isSummaryValue);
}

/**
 * Reason a processor result cannot be accepted, or null when it can.
 * An empty summary counts as no result.
 */
export function summaryRejection(value: unknown): string | null {
  if (!isResultSummary(value)) {
    return 'Processor result is not a flat summary object';
  }
  if (Object.keys(value).length === 0) {
    return 'Processor returned an empty result';
  }
  return null;
}
