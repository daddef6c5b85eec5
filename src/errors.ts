import type { EImageProvider, StockImageErrorKind } from './types.js';

export interface StockImageErrorOptions {
  provider?: EImageProvider;
  status?: number;
  cause?: unknown;
}

/**
 * Error scoped to a single request. `kind` tells the caller what went wrong,
 * `provider` which upstream API it came from (if any).
 */
export class StockImageError extends Error {
  public readonly kind: StockImageErrorKind;
  public readonly provider?: EImageProvider;
  public readonly status?: number;

  constructor(kind: StockImageErrorKind, message: string, options: StockImageErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'StockImageError';
    this.kind = kind;
    this.provider = options.provider;
    this.status = options.status;
  }

  toJSON(): { kind: StockImageErrorKind; provider?: EImageProvider; status?: number; message: string } {
    return {
      kind: this.kind,
      ...(this.provider ? { provider: this.provider } : {}),
      ...(this.status !== undefined ? { status: this.status } : {}),
      message: this.message,
    };
  }
}

export function invalidParameter(message: string): StockImageError {
  return new StockImageError('InvalidParameter', message);
}

export function isStockImageError(error: unknown): error is StockImageError {
  return error instanceof StockImageError;
}
