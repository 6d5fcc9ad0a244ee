import type { V1StatefulSet } from "@kubernetes/client-node";
import { defineResource } from "../kube-resource";
import { getKubeResourceSchema } from "../schema";
import { getAge } from "../format";
import type { ResourceHandler } from "../types";

export type StatefulSetSummary = {
  name: string;
  namespace?: string;
  ready: string;
  serviceName?: string;
  images: string[];
  age: string;
};

export function summarizeStatefulSet(statefulSet: V1StatefulSet, now: Date): StatefulSetSummary {
  return {
    name: statefulSet.metadata?.name ?? "N/A",
    namespace: statefulSet.metadata?.namespace,
    ready: `${statefulSet.status?.readyReplicas ?? 0}/${statefulSet.spec?.replicas ?? 0}`,
    serviceName: statefulSet.spec?.serviceName,
    images: (statefulSet.spec?.template?.spec?.containers ?? []).map((c) => c.image ?? ""),
    age: getAge(statefulSet.metadata?.creationTimestamp, now),
  };
}

export const statefulSetHandler: ResourceHandler = defineResource({
  schema: getKubeResourceSchema("statefulsets"),
  verbs: ["list", "get"],
  summarize: summarizeStatefulSet,
});
