import type { V1Service } from "@kubernetes/client-node";
import { defineResource } from "../kube-resource";
import { getKubeResourceSchema } from "../schema";
import { getAge, labelSelectorString } from "../format";
import type { ResourceHandler } from "../types";
import { involvedEvents } from "./events";

export type ServiceSummary = {
  name: string;
  namespace?: string;
  type: string;
  clusterIP?: string;
  externalIPs: string[];
  ports: string[];
  selector?: string;
  age: string;
};

export function summarizeService(service: V1Service, now: Date): ServiceSummary {
  const ingress = (service.status?.loadBalancer?.ingress ?? [])
    .map((entry) => entry.ip ?? entry.hostname)
    .filter((address): address is string => Boolean(address));
  return {
    name: service.metadata?.name ?? "N/A",
    namespace: service.metadata?.namespace,
    type: service.spec?.type ?? "ClusterIP",
    clusterIP: service.spec?.clusterIP,
    externalIPs: [...(service.spec?.externalIPs ?? []), ...ingress],
    ports: (service.spec?.ports ?? []).map((p) =>
      p.nodePort ? `${p.port}:${p.nodePort}/${p.protocol ?? "TCP"}` : `${p.port}/${p.protocol ?? "TCP"}`),
    selector: labelSelectorString(service.spec?.selector),
    age: getAge(service.metadata?.creationTimestamp, now),
  };
}

const schema = getKubeResourceSchema("services");

export const serviceHandler: ResourceHandler = {
  ...defineResource({
    schema,
    verbs: ["list", "get", "create", "update", "delete"],
    summarize: summarizeService,
  }),
  events: involvedEvents(schema),
};
