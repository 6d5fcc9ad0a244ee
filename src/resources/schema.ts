export interface KubeResourceSchema {
  kind: string;
  apiVersion: string;
  singular: string;
  plural: string;
  abbreviation?: string;
  namespaced: boolean;
}

/**
 * Kubernetes resource schemas served by the built-in handlers, by API group.
 */
export const kubeResources: readonly KubeResourceSchema[] = [
  // Core API (v1)
  { kind: "Pod", apiVersion: "v1", singular: "pod", plural: "pods", abbreviation: "po", namespaced: true },
  { kind: "Service", apiVersion: "v1", singular: "service", plural: "services", abbreviation: "svc", namespaced: true },
  { kind: "ConfigMap", apiVersion: "v1", singular: "configmap", plural: "configmaps", abbreviation: "cm", namespaced: true },
  { kind: "Namespace", apiVersion: "v1", singular: "namespace", plural: "namespaces", abbreviation: "ns", namespaced: false },
  { kind: "Node", apiVersion: "v1", singular: "node", plural: "nodes", abbreviation: "no", namespaced: false },
  { kind: "PersistentVolume", apiVersion: "v1", singular: "persistentvolume", plural: "persistentvolumes", abbreviation: "pv", namespaced: false },
  { kind: "PersistentVolumeClaim", apiVersion: "v1", singular: "persistentvolumeclaim", plural: "persistentvolumeclaims", abbreviation: "pvc", namespaced: true },
  { kind: "Endpoints", apiVersion: "v1", singular: "endpoints", plural: "endpoints", abbreviation: "ep", namespaced: true },
  { kind: "Event", apiVersion: "v1", singular: "event", plural: "events", abbreviation: "ev", namespaced: true },

  // Apps API (apps/v1)
  { kind: "Deployment", apiVersion: "apps/v1", singular: "deployment", plural: "deployments", abbreviation: "deploy", namespaced: true },
  { kind: "ReplicaSet", apiVersion: "apps/v1", singular: "replicaset", plural: "replicasets", abbreviation: "rs", namespaced: true },
  { kind: "StatefulSet", apiVersion: "apps/v1", singular: "statefulset", plural: "statefulsets", abbreviation: "sts", namespaced: true },

  // Batch API (batch/v1)
  { kind: "Job", apiVersion: "batch/v1", singular: "job", plural: "jobs", namespaced: true },
  { kind: "CronJob", apiVersion: "batch/v1", singular: "cronjob", plural: "cronjobs", abbreviation: "cj", namespaced: true },

  // Networking API (networking.k8s.io/v1)
  { kind: "Ingress", apiVersion: "networking.k8s.io/v1", singular: "ingress", plural: "ingresses", abbreviation: "ing", namespaced: true },

  // Storage API (storage.k8s.io/v1)
  { kind: "StorageClass", apiVersion: "storage.k8s.io/v1", singular: "storageclass", plural: "storageclasses", abbreviation: "sc", namespaced: false },
];

const lookup = kubeResources.reduce((acc, schema) => {
  acc.set(schema.singular, schema);
  acc.set(schema.plural, schema);
  acc.set(schema.kind.toLowerCase(), schema);
  if (schema.abbreviation) acc.set(schema.abbreviation, schema);
  return acc;
}, new Map<string, KubeResourceSchema>());

/**
 * Finds a schema by singular (`pod`), plural (`pods`), kind (`Pod`) or
 * abbreviation (`po`).
 */
export function findKubeResourceSchema(resourceType: string): KubeResourceSchema | undefined {
  return lookup.get(resourceType.toLowerCase());
}

export function getKubeResourceSchema(resourceType: string): KubeResourceSchema {
  const schema = findKubeResourceSchema(resourceType);
  if (!schema) {
    throw new Error(`Unsupported Kubernetes resource type: '${resourceType}'.`);
  }
  return schema;
}
