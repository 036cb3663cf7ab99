/**
 * Outcome of an operation that reports failure as a value instead of throwing.
 */
export type Result<TData, TError = Error> =
  | { ok: true; data: TData }
  | { ok: false; error: TError };

/**
 * Awaits `promise` and captures a rejection as `{ ok: false }`.
 */
export async function settle<TData>(
  promise: Promise<TData>
): Promise<Result<TData, unknown>> {
  try {
    return { ok: true, data: await promise };
  } catch (error) {
    return { ok: false, error };
  }
}
