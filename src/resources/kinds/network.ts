import type { V1Endpoints, V1Ingress } from "@kubernetes/client-node";
import { defineResource } from "../kube-resource";
import { getKubeResourceSchema } from "../schema";
import { getAge } from "../format";
import type { ResourceHandler } from "../types";

export type IngressSummary = {
  name: string;
  namespace?: string;
  className?: string;
  hosts: string[];
  addresses: string[];
  ports: string;
  age: string;
};

export function summarizeIngress(ingress: V1Ingress, now: Date): IngressSummary {
  return {
    name: ingress.metadata?.name ?? "N/A",
    namespace: ingress.metadata?.namespace,
    className: ingress.spec?.ingressClassName,
    hosts: (ingress.spec?.rules ?? []).map((rule) => rule.host ?? "*"),
    addresses: (ingress.status?.loadBalancer?.ingress ?? [])
      .map((lb) => lb.ip ?? lb.hostname ?? "")
      .filter((address) => address !== ""),
    ports: (ingress.spec?.tls ?? []).length > 0 ? "80, 443" : "80",
    age: getAge(ingress.metadata?.creationTimestamp, now),
  };
}

export type EndpointsSummary = {
  name: string;
  namespace?: string;
  endpoints: string[];
  age: string;
};

// One `ip:port` entry per ready address and port, or the bare ip for a portless subset.
export function summarizeEndpoints(endpoints: V1Endpoints, now: Date): EndpointsSummary {
  const entries = (endpoints.subsets ?? []).flatMap((subset) => {
    const ips = (subset.addresses ?? []).map((address) => address.ip);
    const ports = subset.ports ?? [];
    return ports.length === 0 ? ips : ips.flatMap((ip) => ports.map((port) => `${ip}:${port.port}`));
  });
  return {
    name: endpoints.metadata?.name ?? "N/A",
    namespace: endpoints.metadata?.namespace,
    endpoints: entries,
    age: getAge(endpoints.metadata?.creationTimestamp, now),
  };
}

export const ingressHandler: ResourceHandler = defineResource({
  schema: getKubeResourceSchema("ingresses"),
  verbs: ["list", "get"],
  summarize: summarizeIngress,
});

// Endpoints are maintained by the endpoints controller.
export const endpointsHandler: ResourceHandler = defineResource({
  schema: getKubeResourceSchema("endpoints"),
  verbs: ["list", "get"],
  summarize: summarizeEndpoints,
});
