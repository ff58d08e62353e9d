export type LmScoreErrorCode = 'precondition_failed' | 'endpoint_error' | 'config_invalid';

export class LmScoreError extends Error {
  readonly code: LmScoreErrorCode;

  constructor(code: LmScoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Rejected input; raised before any inference call is made. */
export class PreconditionError extends LmScoreError {
  constructor(message: string) {
    super('precondition_failed', message);
  }
}

/** Transport failure, timeout or non-2xx reply from the inference service. */
export class EndpointError extends LmScoreError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super('endpoint_error', message, { cause: options.cause });
    this.status = options.status;
  }
}

export class ConfigError extends LmScoreError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('config_invalid', message);
    this.issues = issues;
  }
}
