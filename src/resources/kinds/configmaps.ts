import type { V1ConfigMap } from "@kubernetes/client-node";
import { defineResource } from "../kube-resource";
import { getKubeResourceSchema } from "../schema";
import { getAge } from "../format";
import type { ResourceHandler } from "../types";

export type ConfigMapSummary = {
  name: string;
  namespace?: string;
  keys: string[];
  age: string;
};

export function summarizeConfigMap(configMap: V1ConfigMap, now: Date): ConfigMapSummary {
  return {
    name: configMap.metadata?.name ?? "N/A",
    namespace: configMap.metadata?.namespace,
    keys: [...Object.keys(configMap.data ?? {}), ...Object.keys(configMap.binaryData ?? {})].sort(),
    age: getAge(configMap.metadata?.creationTimestamp, now),
  };
}

export const configMapHandler: ResourceHandler = defineResource({
  schema: getKubeResourceSchema("configmaps"),
  verbs: ["list", "get", "create", "update", "delete"],
  summarize: summarizeConfigMap,
});
