import * as k8s from "@kubernetes/client-node";
import type { ClusterContext } from "../clusters/types";
import { ConfigurationError } from "./errors";

export interface KubeconfigSourceOptions {
  /** Kubeconfig file; KUBECONFIG or ~/.kube/config when omitted. */
  path?: string;
  /** Only these contexts are registered, in this order, when given. */
  contexts?: readonly string[];
  defaultNamespace: string;
}

export function loadKubeConfig(path?: string): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  if (path) {
    kc.loadFromFile(path);
  } else {
    kc.loadFromDefault();
  }
  return kc;
}

/**
 * Turns the contexts of a kubeconfig into cluster contexts, one per
 * kubeconfig context, keyed by the context name.
 */
export function contextsFromKubeConfig(kc: k8s.KubeConfig, options: KubeconfigSourceOptions): ClusterContext[] {
  const available = kc.getContexts();
  const selected = options.contexts
    ? options.contexts.map((name) => {
      const context = available.find((c) => c.name === name);
      if (!context) {
        throw new ConfigurationError(`Context '${name}' not found in kubeconfig`);
      }
      return context;
    })
    : available;

  return selected.map((context) => ({
    name: context.name,
    endpoint: kc.getCluster(context.cluster)?.server ?? "",
    defaultNamespace: context.namespace || options.defaultNamespace,
    credential: options.path
      ? { kind: "kubeconfig", path: options.path, context: context.name }
      : { kind: "kubeconfig", context: context.name },
  }));
}

/**
 * Builds a kubeconfig holding only the given cluster context, so that the
 * client for one cluster never follows another cluster's current-context.
 */
export function buildKubeConfig(context: ClusterContext, { skipTlsVerify = false } = {}): k8s.KubeConfig {
  const credential = context.credential;

  if (credential.kind === "token") {
    const kc = new k8s.KubeConfig();
    kc.loadFromOptions({
      clusters: [{
        name: context.name,
        server: context.endpoint,
        caFile: credential.caFile,
        skipTLSVerify: skipTlsVerify,
      }],
      users: [{ name: context.name, token: credential.token }],
      contexts: [{
        name: context.name,
        cluster: context.name,
        user: context.name,
        namespace: context.defaultNamespace,
      }],
      currentContext: context.name,
    });
    return kc;
  }

  const source = loadKubeConfig(credential.path);
  const kubeContext = source.getContextObject(credential.context);
  if (!kubeContext) {
    throw new ConfigurationError(`Context '${credential.context}' not found in kubeconfig`);
  }
  const cluster = source.getCluster(kubeContext.cluster);
  if (!cluster) {
    throw new ConfigurationError(`Cluster '${kubeContext.cluster}' of context '${credential.context}' not found in kubeconfig`);
  }
  const user = source.getUser(kubeContext.user);
  if (!user) {
    throw new ConfigurationError(`User '${kubeContext.user}' of context '${credential.context}' not found in kubeconfig`);
  }

  const kc = new k8s.KubeConfig();
  kc.loadFromOptions({
    clusters: [{ ...cluster, skipTLSVerify: cluster.skipTLSVerify || skipTlsVerify }],
    users: [user],
    contexts: [kubeContext],
    currentContext: kubeContext.name,
  });
  return kc;
}
