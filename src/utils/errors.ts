export type ErrorKind =
  | "UnknownToolError"
  | "InvalidParameterError"
  | "UnknownClusterError"
  | "DuplicateClusterError"
  | "DuplicateToolError"
  | "AuthenticationError"
  | "UnsupportedOperationError"
  | "NotFoundError"
  | "ValidationError"
  | "TransientError"
  | "TimeoutError"
  | "ClusterApiError"
  | "ConfigurationError";

/**
 * Serializable form of a {@link FleetError}, carried in operation results
 * and tool responses.
 */
export interface ErrorDetail {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  parameter?: string;
  statusCode?: number;
}

export abstract class FleetError extends Error {
  abstract readonly kind: ErrorKind;
  readonly retryable: boolean = false;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }

  toDetail(): ErrorDetail {
    return { kind: this.kind, message: this.message, retryable: this.retryable };
  }
}

export class UnknownToolError extends FleetError {
  readonly kind = "UnknownToolError";

  constructor(readonly tool: string) {
    super(`Unknown tool '${tool}'`);
  }
}

export class InvalidParameterError extends FleetError {
  readonly kind = "InvalidParameterError";

  constructor(readonly parameter: string, reason: string) {
    super(`Invalid parameter '${parameter}': ${reason}`);
  }

  override toDetail(): ErrorDetail {
    return { ...super.toDetail(), parameter: this.parameter };
  }
}

export class UnknownClusterError extends FleetError {
  readonly kind = "UnknownClusterError";

  constructor(readonly cluster: string) {
    super(`Unknown cluster '${cluster}'`);
  }
}

export class DuplicateClusterError extends FleetError {
  readonly kind = "DuplicateClusterError";

  constructor(readonly cluster: string) {
    super(`Cluster '${cluster}' is already registered`);
  }
}

export class DuplicateToolError extends FleetError {
  readonly kind = "DuplicateToolError";

  constructor(readonly tool: string) {
    super(`Tool '${tool}' is already registered`);
  }
}

export class AuthenticationError extends FleetError {
  readonly kind = "AuthenticationError";

  constructor(readonly cluster: string, reason: string, options?: ErrorOptions) {
    super(`Authentication to cluster '${cluster}' failed: ${reason}`, options);
  }
}

export class UnsupportedOperationError extends FleetError {
  readonly kind = "UnsupportedOperationError";

  constructor(readonly resource: string, readonly verb: string) {
    super(`Operation '${verb}' is not supported for ${resource}`);
  }
}

/**
 * Errors reported by the Kubernetes API server keep its HTTP status, when
 * there was one.
 */
export abstract class ApiFailure extends FleetError {
  constructor(message: string, readonly statusCode?: number, options?: ErrorOptions) {
    super(message, options);
  }

  override toDetail(): ErrorDetail {
    const detail = super.toDetail();
    return this.statusCode === undefined ? detail : { ...detail, statusCode: this.statusCode };
  }
}

export class NotFoundError extends ApiFailure {
  readonly kind = "NotFoundError";
}

export class ValidationError extends ApiFailure {
  readonly kind = "ValidationError";
}

export class TransientError extends ApiFailure {
  readonly kind = "TransientError";
  override readonly retryable = true;
}

export class ClusterApiError extends ApiFailure {
  readonly kind = "ClusterApiError";
}

export class TimeoutError extends FleetError {
  readonly kind = "TimeoutError";
  override readonly retryable = true;

  constructor(readonly timeoutMs: number) {
    super(`Operation did not complete within ${timeoutMs}ms`);
  }
}

export class ConfigurationError extends FleetError {
  readonly kind = "ConfigurationError";
}

export function isFleetError(error: unknown): error is FleetError {
  return error instanceof FleetError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
