import * as k8s from "@kubernetes/client-node";
import { abortable, throwIfAborted } from "../utils/abort";
import type { ClientCapability, ListQuery, ObjectRef, PodLogQuery } from "./types";

function header(ref: ObjectRef) {
  return {
    apiVersion: ref.apiVersion,
    kind: ref.kind,
    metadata: { name: ref.name, namespace: ref.namespace ?? "" },
  };
}

/**
 * Capability backed by @kubernetes/client-node. The client's requests cannot
 * be cancelled, so an aborted call stops waiting and drops the response.
 */
export class KubeClientCapability implements ClientCapability {
  private readonly objects: k8s.KubernetesObjectApi;
  private readonly core: k8s.CoreV1Api;

  constructor(readonly cluster: string, kc: k8s.KubeConfig) {
    this.objects = k8s.KubernetesObjectApi.makeApiClient(kc);
    this.core = kc.makeApiClient(k8s.CoreV1Api);
  }

  async list(query: ListQuery, signal?: AbortSignal): Promise<k8s.KubernetesObject[]> {
    throwIfAborted(signal);
    const { body } = await abortable(this.objects.list(
      query.apiVersion,
      query.kind,
      query.namespace,
      undefined,
      undefined,
      undefined,
      query.fieldSelector,
      query.labelSelector,
      query.limit,
    ), signal);
    return body.items;
  }

  async read(ref: ObjectRef, signal?: AbortSignal): Promise<k8s.KubernetesObject> {
    throwIfAborted(signal);
    const { body } = await abortable(this.objects.read(header(ref)), signal);
    return body;
  }

  async create(manifest: k8s.KubernetesObject, signal?: AbortSignal): Promise<k8s.KubernetesObject> {
    throwIfAborted(signal);
    const { body } = await abortable(this.objects.create(manifest), signal);
    return body;
  }

  async replace(manifest: k8s.KubernetesObject, signal?: AbortSignal): Promise<k8s.KubernetesObject> {
    throwIfAborted(signal);
    const { body } = await abortable(this.objects.replace(manifest), signal);
    return body;
  }

  async patch(manifest: k8s.KubernetesObject, signal?: AbortSignal): Promise<k8s.KubernetesObject> {
    throwIfAborted(signal);
    const { body } = await abortable(this.objects.patch(manifest), signal);
    return body;
  }

  async delete(ref: ObjectRef, propagationPolicy?: string, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    await abortable(this.objects.delete(
      header(ref),
      undefined,
      undefined,
      undefined,
      undefined,
      propagationPolicy,
    ), signal);
  }

  async readPodLog(query: PodLogQuery, signal?: AbortSignal): Promise<string> {
    throwIfAborted(signal);
    const { body } = await abortable(this.core.readNamespacedPodLog(
      query.name,
      query.namespace,
      query.container,
      false,
      undefined,
      undefined,
      undefined,
      query.previous,
      undefined,
      query.tailLines,
      query.timestamps,
    ), signal);
    return body;
  }
}

/**
 * Asks the API server for its version with the given credentials; rejects
 * when the server refuses them or cannot be reached.
 */
export async function probeServerVersion(kc: k8s.KubeConfig): Promise<string> {
  const { body } = await kc.makeApiClient(k8s.VersionApi).getCode();
  return body.gitVersion;
}
