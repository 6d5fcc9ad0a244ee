import type { KubernetesObject } from "@kubernetes/client-node";
import type { ClientCapability } from "../clusters/types";
import type { Logger } from "../utils/logger";
import type { KubeResourceSchema } from "./schema";

export const VERBS = ["list", "get", "create", "update", "delete", "scale", "logs", "events", "rollout_status"] as const;
export type Verb = typeof VERBS[number];

/**
 * Everything one handler call needs about its target cluster. `namespace`
 * is already defaulted from the cluster context; it is undefined for a
 * cluster-wide list and ignored by cluster-scoped kinds.
 */
export interface OperationContext {
  cluster: string;
  capability: ClientCapability;
  namespace?: string;
  signal?: AbortSignal;
  logger: Logger;
}

export interface ListFilters {
  labelSelector?: string;
  fieldSelector?: string;
  limit?: number;
}

export interface DeleteOptions {
  propagationPolicy?: "Foreground" | "Background" | "Orphan";
}

export interface LogOptions {
  container?: string;
  tailLines?: number;
  previous?: boolean;
  timestamps?: boolean;
}

export interface DeleteAck {
  kind: string;
  name: string;
  namespace?: string;
  deleted: true;
}

export type ResourceSummary = Record<string, unknown>;

export interface RolloutCondition {
  type: string;
  status: string;
  reason?: string;
  message?: string;
}

/** Progress of a workload towards its desired replica count. */
export interface RolloutStatus {
  name: string;
  namespace?: string;
  desired: number;
  /** Replicas running the latest template; deployments only. */
  updated?: number;
  ready: number;
  available: number;
  complete: boolean;
  message: string;
  conditions: RolloutCondition[];
}

/**
 * Operations against a single cluster for one resource kind. A verb left
 * undefined is unsupported for the kind. Handlers keep no state between
 * calls; failures surface as FleetError kinds.
 */
export interface ResourceHandler {
  readonly schema: KubeResourceSchema;
  list?(ctx: OperationContext, filters: ListFilters): Promise<ResourceSummary[]>;
  get?(ctx: OperationContext, name: string): Promise<KubernetesObject>;
  create?(ctx: OperationContext, manifest: KubernetesObject): Promise<KubernetesObject>;
  update?(ctx: OperationContext, name: string, manifest: KubernetesObject): Promise<KubernetesObject>;
  delete?(ctx: OperationContext, name: string, options: DeleteOptions): Promise<DeleteAck>;
  scale?(ctx: OperationContext, name: string, replicas: number): Promise<KubernetesObject>;
  logs?(ctx: OperationContext, name: string, options: LogOptions): Promise<string>;
  /** Events whose involved object is the named resource. */
  events?(ctx: OperationContext, name: string): Promise<ResourceSummary[]>;
  rolloutStatus?(ctx: OperationContext, name: string): Promise<RolloutStatus>;
}
