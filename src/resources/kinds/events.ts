import type { CoreV1Event } from "@kubernetes/client-node";
import { defineResource, listSummaries, requireName } from "../kube-resource";
import { getKubeResourceSchema, type KubeResourceSchema } from "../schema";
import { getAge } from "../format";
import type { OperationContext, ResourceHandler, ResourceSummary } from "../types";

export type EventSummary = {
  name: string;
  namespace?: string;
  type?: string;
  reason?: string;
  object: string;
  message?: string;
  count: number;
  lastSeen: string;
};

export function summarizeEvent(event: CoreV1Event, now: Date): EventSummary {
  const involved = event.involvedObject;
  return {
    name: event.metadata?.name ?? "N/A",
    namespace: event.metadata?.namespace,
    type: event.type,
    reason: event.reason,
    object: `${involved?.kind ?? "Unknown"}/${involved?.name ?? ""}`,
    message: event.message,
    count: event.count ?? 1,
    lastSeen: getAge(event.lastTimestamp ?? event.eventTime ?? event.metadata?.creationTimestamp, now),
  };
}

const schema = getKubeResourceSchema("events");

// Events are written by controllers and the kubelet; only reads are served.
export const eventHandler: ResourceHandler = defineResource({
  schema,
  verbs: ["list", "get"],
  summarize: summarizeEvent,
});

const listEvents = listSummaries({ schema, summarize: summarizeEvent });

/**
 * Events verb for a kind: the events in the object's namespace whose
 * involved object has its name and kind.
 */
export function involvedEvents(owner: KubeResourceSchema) {
  return (ctx: OperationContext, name: string): Promise<ResourceSummary[]> =>
    listEvents(ctx, {
      fieldSelector: `involvedObject.name=${requireName(owner, name)},involvedObject.kind=${owner.kind}`,
    });
}
