import type { UrlStatus } from './types.js';

// pending ⇄ paused, pending → in_progress → {visited, pending, error}.
// visited is terminal; error only leaves through an operator resume.
const ALLOWED: Record<UrlStatus, readonly UrlStatus[]> = {
  pending: ['in_progress', 'visited', 'paused', 'error'],
  in_progress: ['pending', 'visited', 'error'],
  paused: ['pending'],
  error: ['pending'],
  visited: []
};

export function canTransition(from: UrlStatus, to: UrlStatus): boolean {
  return ALLOWED[from].includes(to);
}

/** Status after a failed fetch, given the already-incremented retry count. */
export function statusAfterFailure(retryCount: number, maxRetries: number): 'pending' | 'error' {
  return retryCount > maxRetries ? 'error' : 'pending';
}

export function retryDelayMs(retryCount: number, baseMs: number): number {
  if (baseMs <= 0) return 0;
  return baseMs * 2 ** Math.max(0, retryCount - 1);
}
