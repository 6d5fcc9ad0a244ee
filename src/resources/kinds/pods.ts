import type { V1Pod } from "@kubernetes/client-node";
import { withKubeErrors } from "../kube-errors";
import { defineResource } from "../kube-resource";
import { getKubeResourceSchema } from "../schema";
import { getAge } from "../format";
import type { LogOptions, OperationContext, ResourceHandler } from "../types";
import { involvedEvents } from "./events";

export type PodSummary = {
  name: string;
  namespace?: string;
  status: string;
  ready: string;
  restarts: number;
  node?: string;
  podIP?: string;
  age: string;
};

export function summarizePod(pod: V1Pod, now: Date): PodSummary {
  const totalContainers = pod.spec?.containers?.length ?? 0;
  const statuses = pod.status?.containerStatuses ?? [];
  const readyContainers = statuses.filter((c) => c.ready).length;
  return {
    name: pod.metadata?.name ?? "N/A",
    namespace: pod.metadata?.namespace,
    status: pod.status?.phase ?? "Unknown",
    ready: `${readyContainers}/${totalContainers}`,
    restarts: statuses.reduce((sum, c) => sum + (c.restartCount || 0), 0),
    node: pod.spec?.nodeName,
    podIP: pod.status?.podIP,
    age: getAge(pod.metadata?.creationTimestamp, now),
  };
}

const schema = getKubeResourceSchema("pods");

async function podLogs(ctx: OperationContext, name: string, options: LogOptions): Promise<string> {
  return withKubeErrors(ctx.cluster, () => ctx.capability.readPodLog({
    name,
    namespace: ctx.namespace ?? "default",
    ...options,
  }, ctx.signal));
}

// Pods are replaced through their controllers, so there is no update verb.
export const podHandler: ResourceHandler = {
  ...defineResource({
    schema,
    verbs: ["list", "get", "create", "delete"],
    summarize: summarizePod,
  }),
  logs: podLogs,
  events: involvedEvents(schema),
};
