import type { V1ReplicaSet } from "@kubernetes/client-node";
import { defineResource, describeObject, scaleReplicas } from "../kube-resource";
import { getKubeResourceSchema } from "../schema";
import { getAge, labelSelectorString, rolloutConditions } from "../format";
import type { ResourceHandler, RolloutStatus } from "../types";
import { involvedEvents } from "./events";

export type ReplicaSetSummary = {
  name: string;
  namespace?: string;
  desired: number;
  current: number;
  ready: number;
  selector?: string;
  owner?: string;
  age: string;
};

export function summarizeReplicaSet(replicaSet: V1ReplicaSet, now: Date): ReplicaSetSummary {
  const owner = replicaSet.metadata?.ownerReferences?.find((ref) => ref.controller);
  return {
    name: replicaSet.metadata?.name ?? "N/A",
    namespace: replicaSet.metadata?.namespace,
    desired: replicaSet.spec?.replicas ?? 0,
    current: replicaSet.status?.replicas ?? 0,
    ready: replicaSet.status?.readyReplicas ?? 0,
    selector: labelSelectorString(replicaSet.spec?.selector?.matchLabels),
    owner: owner ? `${owner.kind}/${owner.name}` : undefined,
    age: getAge(replicaSet.metadata?.creationTimestamp, now),
  };
}

export function replicaSetRolloutStatus(replicaSet: V1ReplicaSet): RolloutStatus {
  const name = replicaSet.metadata?.name ?? "N/A";
  const desired = replicaSet.spec?.replicas ?? 0;
  const ready = replicaSet.status?.readyReplicas ?? 0;
  const available = replicaSet.status?.availableReplicas ?? 0;
  const generation = replicaSet.metadata?.generation;
  const observed = generation === undefined || (replicaSet.status?.observedGeneration ?? 0) >= generation;
  const complete = observed && ready >= desired && available >= desired;
  return {
    name,
    namespace: replicaSet.metadata?.namespace,
    desired,
    ready,
    available,
    complete,
    message: complete
      ? `replicaset "${name}" has all ${desired} replicas available`
      : `Waiting for replicaset "${name}": ${available} of ${desired} replicas are available`,
    conditions: rolloutConditions(replicaSet.status?.conditions),
  };
}

const schema = getKubeResourceSchema("replicasets");

export const replicaSetHandler: ResourceHandler = {
  ...defineResource({
    schema,
    verbs: ["list", "get", "create", "update", "delete"],
    summarize: summarizeReplicaSet,
  }),
  scale: scaleReplicas(schema),
  events: involvedEvents(schema),
  rolloutStatus: describeObject({ schema, describe: replicaSetRolloutStatus }),
};
