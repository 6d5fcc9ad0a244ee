import { configMapHandler } from "./kinds/configmaps";
import { deploymentHandler } from "./kinds/deployments";
import { eventHandler } from "./kinds/events";
import { cronJobHandler, jobHandler } from "./kinds/jobs";
import { namespaceHandler } from "./kinds/namespaces";
import { endpointsHandler, ingressHandler } from "./kinds/network";
import { nodeHandler } from "./kinds/nodes";
import { podHandler } from "./kinds/pods";
import { replicaSetHandler } from "./kinds/replicasets";
import { serviceHandler } from "./kinds/services";
import { statefulSetHandler } from "./kinds/statefulsets";
import { persistentVolumeClaimHandler, persistentVolumeHandler, storageClassHandler } from "./kinds/storage";
import type { ResourceHandler, Verb } from "./types";

export const builtinHandlers: readonly ResourceHandler[] = [
  podHandler,
  deploymentHandler,
  serviceHandler,
  replicaSetHandler,
  configMapHandler,
  namespaceHandler,
  nodeHandler,
  statefulSetHandler,
  jobHandler,
  cronJobHandler,
  ingressHandler,
  endpointsHandler,
  persistentVolumeClaimHandler,
  persistentVolumeHandler,
  storageClassHandler,
  eventHandler,
];

export function supportedVerbs(handler: ResourceHandler): Verb[] {
  const verbs: Verb[] = [];
  if (handler.list) verbs.push("list");
  if (handler.get) verbs.push("get");
  if (handler.create) verbs.push("create");
  if (handler.update) verbs.push("update");
  if (handler.delete) verbs.push("delete");
  if (handler.scale) verbs.push("scale");
  if (handler.logs) verbs.push("logs");
  if (handler.events) verbs.push("events");
  if (handler.rolloutStatus) verbs.push("rollout_status");
  return verbs;
}

export * from "./types";
export * from "./schema";
