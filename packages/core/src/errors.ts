export type AlignErrorCode = 'DECODE_FAILED' | 'READ_FAILED' | 'INVALID_CONFIG' | 'UNKNOWN';

export interface AlignErrorInfo {
  code: AlignErrorCode;
  message: string;
}

export class AlignError extends Error {
  code: AlignErrorCode;

  constructor(code: AlignErrorCode, message: string) {
    super(message);
    this.name = 'AlignError';
    this.code = code;
  }
}

export function alignError(code: AlignErrorCode, message: string): AlignError {
  return new AlignError(code, message);
}

export function toAlignErrorInfo(err: unknown, fallbackCode: AlignErrorCode = 'UNKNOWN'): AlignErrorInfo {
  if (err instanceof AlignError) {
    return { code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { code: fallbackCode, message: err.message || 'Unknown error' };
  }
  return { code: fallbackCode, message: String(err || 'Unknown error') };
}
