/** Error categories for the provisioner */
export const ErrorCode = {
  // Plan errors
  PLAN_NOT_FOUND: 'PLAN_NOT_FOUND',
  PLAN_PARSE_ERROR: 'PLAN_PARSE_ERROR',
  PLAN_VALIDATION_ERROR: 'PLAN_VALIDATION_ERROR',

  // State errors
  STATE_CORRUPT: 'STATE_CORRUPT',
  STATE_WRITE_FAILED: 'STATE_WRITE_FAILED',
  STEP_NOT_FOUND: 'STEP_NOT_FOUND',

  // Remote errors
  OPERATION_FAILED: 'OPERATION_FAILED',

  // CLI errors
  INVALID_CONFIG: 'INVALID_CONFIG',
  MISSING_ARGUMENT: 'MISSING_ARGUMENT',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Codes reported with the validation exit code */
export const VALIDATION_CODES: readonly ErrorCode[] = [
  ErrorCode.PLAN_NOT_FOUND,
  ErrorCode.PLAN_PARSE_ERROR,
  ErrorCode.PLAN_VALIDATION_ERROR,
  ErrorCode.STATE_CORRUPT,
  ErrorCode.INVALID_CONFIG,
  ErrorCode.MISSING_ARGUMENT,
];

/** Provisioner error with code and optional remediation hint */
export class ProvisionError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'ProvisionError';
  }
}

/** Failure reported by a Google Cloud control-plane API */
export class GcpApiError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly reason?: string,
  ) {
    super(message);
    this.name = 'GcpApiError';
  }
}

export function isAlreadyExists(err: unknown): boolean {
  return err instanceof GcpApiError && (err.status === 409 || err.reason === 'ALREADY_EXISTS');
}

export function isNotFound(err: unknown): boolean {
  return err instanceof GcpApiError && (err.status === 404 || err.reason === 'NOT_FOUND');
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
