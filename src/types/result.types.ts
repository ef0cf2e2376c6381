export type ErrorKind = 'timeout' | 'cancelled' | 'failed';

export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; kind: ErrorKind; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E extends Error>(kind: ErrorKind, error: E): Result<never, E> {
  return { ok: false, kind, error };
}
