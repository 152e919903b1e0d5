import * as ccxt from 'ccxt';
import type { VenueError } from '../../types/index.js';

/**
 * ccxt 예외 → VenueError
 * 하위 클래스부터 검사 (RequestTimeout, RateLimitExceeded는 NetworkError 하위)
 */
export function classifyCcxtError(err: unknown): VenueError {
  const message = err instanceof Error ? err.message : String(err);

  if (err instanceof ccxt.InsufficientFunds) {
    return { kind: 'insufficient_margin', message };
  }
  if (err instanceof ccxt.AuthenticationError || err instanceof ccxt.PermissionDenied) {
    return { kind: 'fatal', message };
  }
  if (err instanceof ccxt.BadSymbol) {
    return { kind: 'fatal', message };
  }
  if (err instanceof ccxt.InvalidOrder) {
    return { kind: /min(imum)?\b|too small|less than/i.test(message) ? 'below_minimum' : 'rejected', message };
  }
  if (err instanceof ccxt.NetworkError) {
    // RequestTimeout, RateLimitExceeded, DDoSProtection, ExchangeNotAvailable 포함
    return { kind: 'transient', message };
  }
  if (err instanceof ccxt.ExchangeError) {
    return { kind: 'rejected', message };
  }
  return { kind: 'transient', message };
}
