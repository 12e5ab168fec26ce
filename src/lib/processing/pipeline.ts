import type { PaperError } from "../utils/errors.ts";

/**
 * Outcome of one processing stage
 *
 * - ok: the stage produced its value, continue with the next stage
 * - degraded: the stage gave up but left a usable fallback, skip the rest
 * - failed: stop, the command cannot continue
 */
export type StageResult<T, F = T> =
  | { kind: "ok"; value: T }
  | { kind: "degraded"; fallback: F; reason: string }
  | { kind: "failed"; error: PaperError };

export const ok = <T, F = T>(value: T): StageResult<T, F> => ({
  kind: "ok",
  value,
});

export const degraded = <T, F>(
  fallback: F,
  reason: string,
): StageResult<T, F> => ({
  kind: "degraded",
  fallback,
  reason,
});

export const failed = <T, F = T>(error: PaperError): StageResult<T, F> => ({
  kind: "failed",
  error,
});

/**
 * Runs `stage` on the value of an ok result. Degraded and failed results
 * pass through unchanged.
 */
export async function andThen<A, B, F>(
  result: StageResult<A, F>,
  stage: (value: A) => Promise<StageResult<B, F>>,
): Promise<StageResult<B, F>> {
  if (result.kind !== "ok") return result;
  return stage(result.value);
}

/**
 * Returns the value (or fallback) of a finished pipeline, reporting a
 * degrade reason through `onDegraded` and throwing the error of a failed one.
 */
export function unwrap<T>(
  result: StageResult<T, T>,
  onDegraded: (reason: string) => void,
): T {
  switch (result.kind) {
    case "ok":
      return result.value;
    case "degraded":
      onDegraded(result.reason);
      return result.fallback;
    case "failed":
      throw result.error;
  }
}
