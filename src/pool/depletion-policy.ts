/**
 * What the pool does when a draw asks for more bits than it holds in credit.
 *
 * - permissive: always answer; the hash chain is total and credit is only an estimate
 * - strict: hold the request until credit covers it, or until `timeoutMs` elapses
 *   (`null` waits until cancelled)
 */
export type DepletionPolicy =
  | { readonly kind: 'permissive' }
  | { readonly kind: 'strict'; readonly timeoutMs: number | null };

export const PERMISSIVE: DepletionPolicy = { kind: 'permissive' };

export function strict(timeoutMs: number | null = null): DepletionPolicy {
  return { kind: 'strict', timeoutMs };
}

export interface DrawOptions {
  /** Overrides the strict policy's timeout for this request. */
  readonly timeoutMs?: number | null;
  /** Aborting removes a queued request without touching pool state. */
  readonly signal?: AbortSignal;
}
