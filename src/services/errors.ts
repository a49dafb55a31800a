export type FetchErrorKind = 'Network' | 'Timeout' | 'Upstream' | 'Decode';

export type StoreErrorKind = 'InitFailure' | 'IOFailure';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  /** HTTP status for `Upstream` failures. */
  readonly status?: number;

  constructor(kind: FetchErrorKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.status = options?.status;
  }
}

export class StoreError extends Error {
  readonly kind: StoreErrorKind;

  constructor(kind: StoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'StoreError';
    this.kind = kind;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};
