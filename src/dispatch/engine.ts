import { randomUUID } from "node:crypto";
import type { ClusterRegistry } from "../clusters/registry";
import type { ClusterContext } from "../clusters/types";
import type { ResourceHandler } from "../resources/types";
import type { ToolRegistry } from "../tools/registry";
import type { ToolDescriptor, ToolInvocation } from "../tools/types";
import { MAX_TIMER_MS, abortable, isAbortError } from "../utils/abort";
import {
  AuthenticationError,
  ClusterApiError,
  TimeoutError,
  UnknownClusterError,
  errorMessage,
  isFleetError,
  type ErrorDetail,
} from "../utils/errors";
import type { Logger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { defaultRetryPolicy, withRetry, type RetryPolicy } from "../utils/retry";
import { invokeOperation, prepareArguments, targetNamespace, type OperationArgs } from "./operations";
import { runBounded } from "./pool";
import { overallStatus, type AggregatedResponse, type OperationResult } from "./types";

export interface DispatchEngineOptions {
  tools: ToolRegistry;
  clusters: ClusterRegistry;
  handlers: readonly ResourceHandler[];
  logger?: Logger;
  /** Most clusters contacted at once by a single dispatch. */
  maxConcurrency?: number;
  /** Overall deadline of a dispatch. */
  deadlineMs?: number;
  retry?: Partial<RetryPolicy>;
}

export interface DispatchOptions {
  /** Capped at MAX_TIMER_MS. */
  deadlineMs?: number;
  /** Aborting it ends the dispatch like a reached deadline. */
  signal?: AbortSignal;
}

interface ClusterRun {
  descriptor: ToolDescriptor;
  handler: ResourceHandler | undefined;
  args: OperationArgs;
  signal: AbortSignal;
  deadlineMs: number;
  logger: Logger;
}

function rejected(tool: string, error: ErrorDetail): AggregatedResponse {
  return { tool, status: "failure", results: [], error };
}

/**
 * Validates a tool invocation, resolves its target clusters and runs the
 * matching handler verb on each of them, collecting one result per cluster
 * in resolution order.
 */
export class DispatchEngine {
  private readonly tools: ToolRegistry;
  private readonly clusters: ClusterRegistry;
  private readonly handlers = new Map<string, ResourceHandler>();
  private readonly logger: Logger;
  private readonly maxConcurrency: number;
  private readonly deadlineMs: number;
  private readonly retry: RetryPolicy;

  constructor({
    tools,
    clusters,
    handlers,
    logger = silentLogger,
    maxConcurrency = 8,
    deadlineMs = 30000,
    retry = {},
  }: DispatchEngineOptions) {
    this.tools = tools;
    this.clusters = clusters;
    for (const handler of handlers) {
      this.handlers.set(handler.schema.plural, handler);
    }
    this.logger = logger.child({ component: "dispatch" });
    this.maxConcurrency = Math.max(1, maxConcurrency);
    this.deadlineMs = Math.min(deadlineMs, MAX_TIMER_MS);
    this.retry = { ...defaultRetryPolicy, ...retry };
  }

  /**
   * Resolves with the aggregated response; rejects with UnknownClusterError
   * when the selector names a cluster that is not registered, before any
   * cluster is contacted.
   */
  async dispatch(invocation: ToolInvocation, options: DispatchOptions = {}): Promise<AggregatedResponse> {
    const started = Date.now();
    const logger = this.logger.child({ dispatchId: randomUUID(), tool: invocation.tool });

    let descriptor: ToolDescriptor;
    let args: OperationArgs;
    try {
      descriptor = this.tools.validate(invocation);
      args = prepareArguments(descriptor, invocation.params);
    } catch (error) {
      if (isFleetError(error)) {
        logger.info({ err: error }, "rejected invocation");
        return rejected(invocation.tool, error.toDetail());
      }
      throw error;
    }

    const selector = invocation.clusters ?? this.clusters.defaultCluster;
    if (selector === undefined) {
      throw new UnknownClusterError("<default>");
    }
    const targets = this.clusters.resolve(selector);

    const deadlineMs = Math.min(options.deadlineMs ?? this.deadlineMs, MAX_TIMER_MS);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), deadlineMs);
    const onCallerAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    const run: ClusterRun = {
      descriptor,
      handler: this.handlers.get(descriptor.kind),
      args,
      signal: controller.signal,
      deadlineMs,
      logger,
    };

    const results = new Array<OperationResult>(targets.length);
    try {
      await runBounded(targets.length, this.maxConcurrency, async (index) => {
        results[index] = await this.runOnCluster(targets[index], run);
      });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }

    const status = overallStatus(results);
    logger.info({
      status,
      clusters: targets.length,
      failed: results.filter((result) => result.status === "error").length,
      durationMs: Date.now() - started,
    }, "dispatch finished");
    return { tool: descriptor.name, status, results };
  }

  private async runOnCluster(context: ClusterContext, run: ClusterRun): Promise<OperationResult> {
    const started = Date.now();
    const logger = run.logger.child({ cluster: context.name });
    let attempts = 0;

    const failure = (error: ErrorDetail): OperationResult => ({
      cluster: context.name,
      status: "error",
      error,
      attempts,
      durationMs: Date.now() - started,
    });

    if (run.signal.aborted) {
      return failure(new TimeoutError(run.deadlineMs).toDetail());
    }

    try {
      const payload = await abortable(this.execute(context, run, logger, () => attempts++), run.signal);
      return { cluster: context.name, status: "success", payload, attempts, durationMs: Date.now() - started };
    } catch (error) {
      if (isAbortError(error)) {
        logger.warn({ deadlineMs: run.deadlineMs }, "cluster operation timed out");
        return failure(new TimeoutError(run.deadlineMs).toDetail());
      }
      const fleetError = isFleetError(error) ? error : new ClusterApiError(errorMessage(error), undefined, { cause: error });
      if (fleetError instanceof AuthenticationError && this.clusters.invalidate(context.name)) {
        logger.info("dropped cached capability after refused credentials");
      }
      logger.warn({ err: fleetError, kind: fleetError.kind }, "cluster operation failed");
      return failure(fleetError.toDetail());
    }
  }

  private async execute(
    context: ClusterContext,
    run: ClusterRun,
    logger: Logger,
    onAttempt: () => void,
  ): Promise<unknown> {
    const capability = await this.clusters.capability(context);
    const ctx = {
      cluster: context.name,
      capability,
      namespace: targetNamespace(run.args, context),
      signal: run.signal,
      logger,
    };

    return withRetry(
      () => {
        onAttempt();
        return invokeOperation(run.handler, run.descriptor.kind, run.args, ctx);
      },
      this.retry,
      {
        signal: run.signal,
        onRetry: (error, attempt, delayMs) =>
          logger.info({ attempt, delayMs, reason: errorMessage(error) }, "retrying transient failure"),
      },
    );
  }
}
