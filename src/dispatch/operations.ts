import type { KubernetesObject } from "@kubernetes/client-node";
import type { ClusterContext } from "../clusters/types";
import { isKubernetesObject } from "../resources/manifest";
import type {
  DeleteOptions,
  ListFilters,
  LogOptions,
  OperationContext,
  ResourceHandler,
} from "../resources/types";
import type { ToolDescriptor, ToolParams } from "../tools/types";
import { InvalidParameterError, UnsupportedOperationError } from "../utils/errors";

/** Tool parameters turned into the arguments of one handler verb. */
export type OperationArgs =
  | { verb: "list"; namespace?: string; allNamespaces: boolean; filters: ListFilters }
  | { verb: "get"; namespace?: string; name: string }
  | { verb: "create"; namespace?: string; manifest: KubernetesObject }
  | { verb: "update"; namespace?: string; name: string; manifest: KubernetesObject }
  | { verb: "delete"; namespace?: string; name: string; options: DeleteOptions }
  | { verb: "scale"; namespace?: string; name: string; replicas: number }
  | { verb: "logs"; namespace?: string; name: string; options: LogOptions }
  | { verb: "events"; namespace?: string; name: string }
  | { verb: "rollout_status"; namespace?: string; name: string };

const PROPAGATION_POLICIES = ["Foreground", "Background", "Orphan"] as const;

function optionalString(params: ToolParams, key: string): string | undefined {
  const value = params[key];
  return typeof value === "string" && value !== "" ? value : undefined;
}

function requiredString(params: ToolParams, key: string): string {
  const value = params[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidParameterError(key, "must be a non-empty string");
  }
  return value;
}

function optionalNumber(params: ToolParams, key: string): number | undefined {
  const value = params[key];
  return typeof value === "number" ? value : undefined;
}

function requiredNumber(params: ToolParams, key: string): number {
  const value = params[key];
  if (typeof value !== "number") {
    throw new InvalidParameterError(key, "is required");
  }
  return value;
}

function optionalBoolean(params: ToolParams, key: string): boolean | undefined {
  const value = params[key];
  return typeof value === "boolean" ? value : undefined;
}

function requiredManifest(params: ToolParams, key: string): KubernetesObject {
  const value = params[key];
  if (!isKubernetesObject(value)) {
    throw new InvalidParameterError(key, "must be a Kubernetes manifest object");
  }
  return value;
}

function propagationPolicy(params: ToolParams): DeleteOptions["propagationPolicy"] {
  const value = optionalString(params, "propagationPolicy");
  if (value === undefined) return undefined;
  const policy = PROPAGATION_POLICIES.find((candidate) => candidate === value);
  if (!policy) {
    throw new InvalidParameterError("propagationPolicy", `must be one of ${PROPAGATION_POLICIES.join(", ")}`);
  }
  return policy;
}

/**
 * Reads a validated invocation's parameters into handler arguments. Runs
 * once per dispatch, before any cluster is contacted.
 */
export function prepareArguments(descriptor: ToolDescriptor, params: ToolParams): OperationArgs {
  const namespace = optionalString(params, "namespace");
  switch (descriptor.verb) {
    case "list":
      return {
        verb: "list",
        namespace,
        allNamespaces: optionalBoolean(params, "allNamespaces") ?? false,
        filters: {
          labelSelector: optionalString(params, "labelSelector"),
          fieldSelector: optionalString(params, "fieldSelector"),
          limit: optionalNumber(params, "limit"),
        },
      };
    case "get":
      return { verb: "get", namespace, name: requiredString(params, "name") };
    case "create":
      return { verb: "create", namespace, manifest: requiredManifest(params, "manifest") };
    case "update":
      return {
        verb: "update",
        namespace,
        name: requiredString(params, "name"),
        manifest: requiredManifest(params, "manifest"),
      };
    case "delete":
      return {
        verb: "delete",
        namespace,
        name: requiredString(params, "name"),
        options: { propagationPolicy: propagationPolicy(params) },
      };
    case "scale":
      return {
        verb: "scale",
        namespace,
        name: requiredString(params, "name"),
        replicas: requiredNumber(params, "replicas"),
      };
    case "logs":
      return {
        verb: "logs",
        namespace,
        name: requiredString(params, "name"),
        options: {
          container: optionalString(params, "container"),
          tailLines: optionalNumber(params, "tailLines"),
          previous: optionalBoolean(params, "previous"),
          timestamps: optionalBoolean(params, "timestamps"),
        },
      };
    case "events":
      return { verb: "events", namespace, name: requiredString(params, "name") };
    case "rollout_status":
      return { verb: "rollout_status", namespace, name: requiredString(params, "name") };
  }
}

/**
 * Namespace an operation runs in on one cluster: the explicit parameter,
 * then the manifest's own namespace, then the cluster's default. A list
 * across all namespaces has none.
 */
export function targetNamespace(args: OperationArgs, context: ClusterContext): string | undefined {
  if (args.verb === "list" && args.allNamespaces) return undefined;
  if (args.namespace) return args.namespace;
  if (args.verb === "create" || args.verb === "update") {
    const own = args.manifest.metadata?.namespace;
    if (own) return own;
  }
  return context.defaultNamespace;
}

export async function invokeOperation(
  handler: ResourceHandler | undefined,
  kind: string,
  args: OperationArgs,
  ctx: OperationContext,
): Promise<unknown> {
  const unsupported = () => new UnsupportedOperationError(kind, args.verb);
  switch (args.verb) {
    case "list":
      if (!handler?.list) throw unsupported();
      return handler.list(ctx, args.filters);
    case "get":
      if (!handler?.get) throw unsupported();
      return handler.get(ctx, args.name);
    case "create":
      if (!handler?.create) throw unsupported();
      return handler.create(ctx, args.manifest);
    case "update":
      if (!handler?.update) throw unsupported();
      return handler.update(ctx, args.name, args.manifest);
    case "delete":
      if (!handler?.delete) throw unsupported();
      return handler.delete(ctx, args.name, args.options);
    case "scale":
      if (!handler?.scale) throw unsupported();
      return handler.scale(ctx, args.name, args.replicas);
    case "logs":
      if (!handler?.logs) throw unsupported();
      return handler.logs(ctx, args.name, args.options);
    case "events":
      if (!handler?.events) throw unsupported();
      return handler.events(ctx, args.name);
    case "rollout_status":
      if (!handler?.rolloutStatus) throw unsupported();
      return handler.rolloutStatus(ctx, args.name);
  }
}
