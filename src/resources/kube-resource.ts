import type { KubernetesObject } from "@kubernetes/client-node";
import { ValidationError } from "../utils/errors";
import { withKubeErrors } from "./kube-errors";
import { normalizeManifest } from "./manifest";
import type { KubeResourceSchema } from "./schema";
import type {
  DeleteAck,
  DeleteOptions,
  ListFilters,
  OperationContext,
  ResourceHandler,
  ResourceSummary,
} from "./types";

export type CrudVerb = "list" | "get" | "create" | "update" | "delete";

export interface ResourceSummarizer {
  schema: KubeResourceSchema;
  summarize(resource: KubernetesObject, now: Date): ResourceSummary;
}

export interface ResourceDefinition extends ResourceSummarizer {
  verbs: readonly CrudVerb[];
}

export interface ObjectView<T> {
  schema: KubeResourceSchema;
  describe(resource: KubernetesObject): T;
}

function objectRef(schema: KubeResourceSchema, ctx: OperationContext, name: string) {
  return {
    apiVersion: schema.apiVersion,
    kind: schema.kind,
    name,
    namespace: schema.namespaced ? ctx.namespace : undefined,
  };
}

export function requireName(schema: KubeResourceSchema, name: string): string {
  if (name.trim() === "") {
    throw new ValidationError(`${schema.kind} name must not be empty`);
  }
  return name;
}

export function listSummaries({ schema, summarize }: ResourceSummarizer) {
  return async (ctx: OperationContext, filters: ListFilters): Promise<ResourceSummary[]> => {
    const items = await withKubeErrors(ctx.cluster, () => ctx.capability.list({
      apiVersion: schema.apiVersion,
      kind: schema.kind,
      namespace: schema.namespaced ? ctx.namespace : undefined,
      ...filters,
    }, ctx.signal));
    const now = new Date();
    ctx.logger.debug({ kind: schema.kind, count: items.length }, "listed resources");
    return items.map((item) => summarize(item, now));
  };
}

function readObject(schema: KubeResourceSchema) {
  return (ctx: OperationContext, name: string): Promise<KubernetesObject> =>
    withKubeErrors(ctx.cluster, () => ctx.capability.read(objectRef(schema, ctx, requireName(schema, name)), ctx.signal));
}

/**
 * Builds a handler whose verbs go through the generic object API, for the
 * verbs the definition lists.
 */
export function defineResource({ schema, verbs, summarize }: ResourceDefinition): ResourceHandler {
  const supported = new Set(verbs);

  const list = listSummaries({ schema, summarize });

  const get = readObject(schema);

  const create = (ctx: OperationContext, manifest: KubernetesObject): Promise<KubernetesObject> =>
    withKubeErrors(ctx.cluster, () => ctx.capability.create(
      normalizeManifest(schema, manifest, { namespace: ctx.namespace }),
      ctx.signal,
    ));

  const update = (ctx: OperationContext, name: string, manifest: KubernetesObject): Promise<KubernetesObject> =>
    withKubeErrors(ctx.cluster, () => ctx.capability.replace(
      normalizeManifest(schema, manifest, { name: requireName(schema, name), namespace: ctx.namespace }),
      ctx.signal,
    ));

  const remove = async (ctx: OperationContext, name: string, options: DeleteOptions): Promise<DeleteAck> => {
    const ref = objectRef(schema, ctx, requireName(schema, name));
    await withKubeErrors(ctx.cluster, () =>
      ctx.capability.delete(ref, options.propagationPolicy ?? "Foreground", ctx.signal));
    return ref.namespace === undefined
      ? { kind: schema.kind, name, deleted: true }
      : { kind: schema.kind, name, namespace: ref.namespace, deleted: true };
  };

  return {
    schema,
    list: supported.has("list") ? list : undefined,
    get: supported.has("get") ? get : undefined,
    create: supported.has("create") ? create : undefined,
    update: supported.has("update") ? update : undefined,
    delete: supported.has("delete") ? remove : undefined,
  };
}

type ScalePatch = KubernetesObject & { spec: { replicas: number } };

/**
 * Scale verb for workloads with `spec.replicas`, applied as a patch so the
 * rest of the spec is left alone.
 */
export function scaleReplicas(schema: KubeResourceSchema) {
  return async (ctx: OperationContext, name: string, replicas: number): Promise<KubernetesObject> => {
    if (!Number.isInteger(replicas) || replicas < 0) {
      throw new ValidationError(`replicas must be a non-negative integer, got ${replicas}`);
    }
    const patch: ScalePatch = {
      apiVersion: schema.apiVersion,
      kind: schema.kind,
      metadata: { name: requireName(schema, name), namespace: ctx.namespace },
      spec: { replicas },
    };
    return withKubeErrors(ctx.cluster, () => ctx.capability.patch(patch, ctx.signal));
  };
}

/** Reads one object and reports the view `describe` derives from it. */
export function describeObject<T>({ schema, describe }: ObjectView<T>) {
  const read = readObject(schema);
  return async (ctx: OperationContext, name: string): Promise<T> => describe(await read(ctx, name));
}
