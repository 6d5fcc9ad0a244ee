import type { V1Node } from "@kubernetes/client-node";
import { defineResource } from "../kube-resource";
import { getKubeResourceSchema } from "../schema";
import { getAge } from "../format";
import type { ResourceHandler } from "../types";

const ROLE_LABEL_PREFIX = "node-role.kubernetes.io/";

export type NodeSummary = {
  name: string;
  status: string;
  roles: string[];
  version?: string;
  internalIP?: string;
  age: string;
};

export function summarizeNode(node: V1Node, now: Date): NodeSummary {
  const ready = node.status?.conditions?.find((c) => c.type === "Ready");
  const roles = Object.keys(node.metadata?.labels ?? {})
    .filter((label) => label.startsWith(ROLE_LABEL_PREFIX))
    .map((label) => label.slice(ROLE_LABEL_PREFIX.length))
    .sort();
  return {
    name: node.metadata?.name ?? "N/A",
    status: ready?.status === "True" ? "Ready" : "NotReady",
    roles,
    version: node.status?.nodeInfo?.kubeletVersion,
    internalIP: node.status?.addresses?.find((a) => a.type === "InternalIP")?.address,
    age: getAge(node.metadata?.creationTimestamp, now),
  };
}

// Nodes join through their kubelet; only reads are served.
export const nodeHandler: ResourceHandler = defineResource({
  schema: getKubeResourceSchema("nodes"),
  verbs: ["list", "get"],
  summarize: summarizeNode,
});
