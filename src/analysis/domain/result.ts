/**
 * Outcome of an operation that reports failure instead of throwing.
 */
export type Result<TData, TMeta = unknown> =
  | { ok: true; data: TData; meta?: TMeta }
  | { ok: false; error: string; meta?: TMeta };
