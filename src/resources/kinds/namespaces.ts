import type { V1Namespace } from "@kubernetes/client-node";
import { defineResource } from "../kube-resource";
import { getKubeResourceSchema } from "../schema";
import { getAge } from "../format";
import type { ResourceHandler } from "../types";

export type NamespaceSummary = {
  name: string;
  status: string;
  age: string;
};

export function summarizeNamespace(namespace: V1Namespace, now: Date): NamespaceSummary {
  return {
    name: namespace.metadata?.name ?? "N/A",
    status: namespace.status?.phase ?? "Unknown",
    age: getAge(namespace.metadata?.creationTimestamp, now),
  };
}

export const namespaceHandler: ResourceHandler = defineResource({
  schema: getKubeResourceSchema("namespaces"),
  verbs: ["list", "get", "create", "delete"],
  summarize: summarizeNamespace,
});
