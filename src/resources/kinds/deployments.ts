import type { V1Deployment } from "@kubernetes/client-node";
import { defineResource, describeObject, scaleReplicas } from "../kube-resource";
import { getKubeResourceSchema } from "../schema";
import { getAge, rolloutConditions } from "../format";
import type { ResourceHandler, RolloutStatus } from "../types";
import { involvedEvents } from "./events";

export type DeploymentSummary = {
  name: string;
  namespace?: string;
  ready: string;
  upToDate: number;
  available: number;
  images: string[];
  strategy?: string;
  age: string;
};

export function summarizeDeployment(deployment: V1Deployment, now: Date): DeploymentSummary {
  const desired = deployment.spec?.replicas ?? 0;
  return {
    name: deployment.metadata?.name ?? "N/A",
    namespace: deployment.metadata?.namespace,
    ready: `${deployment.status?.readyReplicas ?? 0}/${desired}`,
    upToDate: deployment.status?.updatedReplicas ?? 0,
    available: deployment.status?.availableReplicas ?? 0,
    images: (deployment.spec?.template?.spec?.containers ?? []).map((c) => c.image ?? ""),
    strategy: deployment.spec?.strategy?.type,
    age: getAge(deployment.metadata?.creationTimestamp, now),
  };
}

function rolloutMessage(deployment: V1Deployment, desired: number): { complete: boolean; message: string } {
  const name = deployment.metadata?.name ?? "";
  const status = deployment.status;
  const generation = deployment.metadata?.generation;
  const updated = status?.updatedReplicas ?? 0;
  const total = status?.replicas ?? 0;
  const available = status?.availableReplicas ?? 0;
  const progressing = status?.conditions?.find((c) => c.type === "Progressing");

  if (generation !== undefined && (status?.observedGeneration ?? 0) < generation) {
    return { complete: false, message: `Waiting for deployment "${name}" spec update to be observed` };
  }
  if (progressing?.reason === "ProgressDeadlineExceeded") {
    return { complete: false, message: `deployment "${name}" exceeded its progress deadline` };
  }
  if (updated < desired) {
    return {
      complete: false,
      message: `Waiting for deployment "${name}" rollout to finish: ${updated} out of ${desired} new replicas have been updated`,
    };
  }
  if (total > updated) {
    return {
      complete: false,
      message: `Waiting for deployment "${name}" rollout to finish: ${total - updated} old replicas are pending termination`,
    };
  }
  if (available < updated) {
    return {
      complete: false,
      message: `Waiting for deployment "${name}" rollout to finish: ${available} of ${updated} updated replicas are available`,
    };
  }
  return { complete: true, message: `deployment "${name}" successfully rolled out` };
}

// Follows the checks of `kubectl rollout status`.
export function deploymentRolloutStatus(deployment: V1Deployment): RolloutStatus {
  const desired = deployment.spec?.replicas ?? 0;
  return {
    name: deployment.metadata?.name ?? "N/A",
    namespace: deployment.metadata?.namespace,
    desired,
    updated: deployment.status?.updatedReplicas ?? 0,
    ready: deployment.status?.readyReplicas ?? 0,
    available: deployment.status?.availableReplicas ?? 0,
    ...rolloutMessage(deployment, desired),
    conditions: rolloutConditions(deployment.status?.conditions),
  };
}

const schema = getKubeResourceSchema("deployments");

export const deploymentHandler: ResourceHandler = {
  ...defineResource({
    schema,
    verbs: ["list", "get", "create", "update", "delete"],
    summarize: summarizeDeployment,
  }),
  scale: scaleReplicas(schema),
  events: involvedEvents(schema),
  rolloutStatus: describeObject({ schema, describe: deploymentRolloutStatus }),
};
