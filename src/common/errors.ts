export type HarvestErrorCode =
  | 'invalid-config'
  | 'invalid-profile'
  | 'allocation-exhausted'
  | 'unsafe-path'
  | 'browser';

export class HarvestError extends Error {
  readonly code: HarvestErrorCode;

  constructor(code: HarvestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HarvestError';
    this.code = code;
  }
}

export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  typeof error === 'object' && error !== null && 'code' in error;

export const errorCode = (error: unknown): string | undefined => {
  if (!isErrnoException(error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
