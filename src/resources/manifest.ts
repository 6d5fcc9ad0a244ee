import type { KubernetesObject } from "@kubernetes/client-node";
import { ValidationError } from "../utils/errors";
import type { KubeResourceSchema } from "./schema";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

/**
 * Checks the header fields a manifest must carry to be sent to the API
 * server; the body is left to the server to validate.
 */
export function isKubernetesObject(value: unknown): value is KubernetesObject {
  if (!isRecord(value)) return false;
  if (!isOptionalString(value.apiVersion) || !isOptionalString(value.kind)) return false;
  const metadata = value.metadata;
  if (metadata === undefined) return true;
  return isRecord(metadata)
    && isOptionalString(metadata.name)
    && isOptionalString(metadata.namespace)
    && isOptionalString(metadata.generateName);
}

export interface ManifestTarget {
  /** Required name, for updates of an existing object. */
  name?: string;
  namespace?: string;
}

/**
 * Fills in the type header, name and namespace of a manifest for the given
 * kind, rejecting manifests that contradict them.
 */
export function normalizeManifest(
  schema: KubeResourceSchema,
  manifest: KubernetesObject,
  target: ManifestTarget,
): KubernetesObject {
  if (manifest.kind && manifest.kind !== schema.kind) {
    throw new ValidationError(`Manifest kind '${manifest.kind}' does not match ${schema.kind}`);
  }
  if (manifest.apiVersion && manifest.apiVersion !== schema.apiVersion) {
    throw new ValidationError(`Manifest apiVersion '${manifest.apiVersion}' does not match ${schema.apiVersion} for ${schema.kind}`);
  }

  const metadata = { ...manifest.metadata };

  if (target.name !== undefined) {
    if (metadata.name && metadata.name !== target.name) {
      throw new ValidationError(`Manifest name '${metadata.name}' does not match '${target.name}'`);
    }
    metadata.name = target.name;
  }
  if (!metadata.name && !metadata.generateName) {
    throw new ValidationError(`Manifest for ${schema.kind} needs metadata.name or metadata.generateName`);
  }

  if (schema.namespaced) {
    if (metadata.namespace && target.namespace && metadata.namespace !== target.namespace) {
      throw new ValidationError(`Manifest namespace '${metadata.namespace}' does not match '${target.namespace}'`);
    }
    metadata.namespace = metadata.namespace || target.namespace;
  } else {
    delete metadata.namespace;
  }

  return { ...manifest, apiVersion: schema.apiVersion, kind: schema.kind, metadata };
}
