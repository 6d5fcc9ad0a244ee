import type { ErrorDetail } from "../utils/errors";

export type DispatchStatus = "success" | "partial_failure" | "failure";

interface ResultBase {
  cluster: string;
  /** Handler calls made for this cluster, retries included. */
  attempts: number;
  durationMs: number;
}

export type OperationResult =
  | (ResultBase & { status: "success"; payload: unknown })
  | (ResultBase & { status: "error"; error: ErrorDetail });

/**
 * One result per resolved cluster, in resolution order. `error` is set, and
 * `results` empty, when the invocation was rejected before any cluster was
 * contacted.
 */
export interface AggregatedResponse {
  tool: string;
  status: DispatchStatus;
  results: OperationResult[];
  error?: ErrorDetail;
}

export function overallStatus(results: readonly OperationResult[]): DispatchStatus {
  const succeeded = results.filter((result) => result.status === "success").length;
  if (succeeded === results.length) return "success";
  return succeeded > 0 ? "partial_failure" : "failure";
}
