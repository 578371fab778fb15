/** Pipeline stage a failed job was in when the error occurred. */
export enum ErrorStage {
  RESOURCE_KEY = 'resource_key',
  PROCESSOR = 'processor',
  VALIDATION = 'validation',
  PERSISTENCE = 'persistence',
}

/** Machine-readable error codes recorded on failed jobs. */
export const ErrorCode = {
  INVALID_RESOURCE_IDENTIFIER: 'INVALID_RESOURCE_IDENTIFIER',
  PROCESSOR_TIMEOUT: 'PROCESSOR_TIMEOUT',
  PROCESSOR_ERROR: 'PROCESSOR_ERROR',
  PROCESSOR_INTERRUPTED: 'PROCESSOR_INTERRUPTED',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  PERSISTENCE_ERROR: 'PERSISTENCE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];
