import type { KubernetesObject } from "@kubernetes/client-node";

export type CredentialRef =
  | {
    kind: "kubeconfig";
    /** Kubeconfig file; the client's default lookup when omitted. */
    path?: string;
    context: string;
  }
  | {
    kind: "token";
    token: string;
    caFile?: string;
  };

export interface ClusterContext {
  readonly name: string;
  readonly endpoint: string;
  readonly credential: Readonly<CredentialRef>;
  readonly defaultNamespace: string;
}

/** A single cluster name, an explicit list of names, or every registered cluster. */
export type ClusterSelector = string | readonly string[] | "all";

export const ALL_CLUSTERS = "all";

export interface ObjectRef {
  apiVersion: string;
  kind: string;
  name: string;
  namespace?: string;
}

export interface ListQuery {
  apiVersion: string;
  kind: string;
  namespace?: string;
  labelSelector?: string;
  fieldSelector?: string;
  limit?: number;
}

export interface PodLogQuery {
  name: string;
  namespace: string;
  container?: string;
  tailLines?: number;
  previous?: boolean;
  timestamps?: boolean;
}

/**
 * Authenticated handle on one cluster's API. Every call accepts an abort
 * signal; implementations stop waiting once it fires.
 */
export interface ClientCapability {
  readonly cluster: string;
  list(query: ListQuery, signal?: AbortSignal): Promise<KubernetesObject[]>;
  read(ref: ObjectRef, signal?: AbortSignal): Promise<KubernetesObject>;
  create(manifest: KubernetesObject, signal?: AbortSignal): Promise<KubernetesObject>;
  replace(manifest: KubernetesObject, signal?: AbortSignal): Promise<KubernetesObject>;
  patch(manifest: KubernetesObject, signal?: AbortSignal): Promise<KubernetesObject>;
  delete(ref: ObjectRef, propagationPolicy?: string, signal?: AbortSignal): Promise<void>;
  readPodLog(query: PodLogQuery, signal?: AbortSignal): Promise<string>;
}

/** Supplies a capability for a cluster context, validating its credentials. */
export interface CredentialSource {
  connect(context: ClusterContext): Promise<ClientCapability>;
}
