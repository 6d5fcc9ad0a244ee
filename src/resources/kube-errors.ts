import { isAbortError } from "../utils/abort";
import {
  AuthenticationError,
  ClusterApiError,
  FleetError,
  NotFoundError,
  TransientError,
  ValidationError,
  errorMessage,
} from "../utils/errors";

const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ESOCKETTIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
]);

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  if ("code" in error && typeof error.code === "number") {
    return error.code;
  }
  return undefined;
}

function networkCodeOf(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  if ("cause" in error) {
    return networkCodeOf(error.cause);
  }
  return undefined;
}

/**
 * The API server's own explanation, from the `Status` body the client
 * attaches to an HttpError.
 */
function apiMessageOf(error: unknown): string {
  if (typeof error === "object" && error !== null && "body" in error) {
    const body = error.body;
    if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
      return body.message;
    }
    if (typeof body === "string" && body.trim() !== "") {
      return body.trim();
    }
  }
  return errorMessage(error);
}

/**
 * Maps a failure from the Kubernetes client onto the error taxonomy:
 * retryable failures become TransientError, everything else a permanent
 * kind. Fleet errors and aborts pass through unchanged.
 */
export function translateKubeError(error: unknown, cluster: string): unknown {
  if (error instanceof FleetError || isAbortError(error)) {
    return error;
  }

  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined) {
    const message = apiMessageOf(error);
    const options = { cause: error };
    if (statusCode === 404) return new NotFoundError(message, statusCode, options);
    if (statusCode === 400 || statusCode === 409 || statusCode === 422) {
      return new ValidationError(message, statusCode, options);
    }
    if (statusCode === 401 || statusCode === 403) {
      return new AuthenticationError(cluster, message, options);
    }
    if (statusCode === 408 || statusCode === 429 || statusCode >= 500) {
      return new TransientError(message, statusCode, options);
    }
    return new ClusterApiError(message, statusCode, options);
  }

  const code = networkCodeOf(error);
  if (code && TRANSIENT_NETWORK_CODES.has(code)) {
    return new TransientError(`${code}: ${errorMessage(error)}`, undefined, { cause: error });
  }

  return new ClusterApiError(errorMessage(error), undefined, { cause: error });
}

export async function withKubeErrors<T>(cluster: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw translateKubeError(error, cluster);
  }
}
