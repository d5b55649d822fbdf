export type PolicyErrorCode = 'E_END_POS' | 'E_TOKEN_SCHEMA' | 'E_TOKEN_ORDER' | 'E_SCAN_ORDER';

export class PolicyError extends Error {
  readonly code: PolicyErrorCode;
  readonly details?: unknown;

  constructor(code: PolicyErrorCode, message: string, details?: unknown) {
    super(`${code}: ${message}`);
    this.name = 'PolicyError';
    this.code = code;
    this.details = details;
  }
}

export const isPolicyError = (value: unknown): value is PolicyError => value instanceof PolicyError;
