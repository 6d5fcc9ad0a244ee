import { KubeconfigCredentialSource } from "./clusters/credentials";
import { ClusterRegistry } from "./clusters/registry";
import type { ClusterContext, CredentialSource } from "./clusters/types";
import type { Config } from "./config";
import { DispatchEngine } from "./dispatch/engine";
import { builtinHandlers } from "./resources";
import { buildToolCatalog } from "./tools/catalog";
import { ToolRegistry } from "./tools/registry";
import type { Logger } from "./utils/logger";

export interface Fleet {
  clusters: ClusterRegistry;
  tools: ToolRegistry;
  engine: DispatchEngine;
}

export interface FleetOptions {
  config: Config;
  logger: Logger;
  contexts: readonly ClusterContext[];
  /** Defaults to the kubeconfig-backed source. */
  credentials?: CredentialSource;
  defaultCluster?: string;
}

/**
 * Wires the registries and the dispatch engine for a set of cluster contexts.
 */
export function buildFleet({ config, logger, contexts, credentials, defaultCluster }: FleetOptions): Fleet {
  const clusters = new ClusterRegistry({
    credentials: credentials ?? new KubeconfigCredentialSource({
      verify: config.verifyCredentials,
      skipTlsVerify: config.skipTlsVerify,
      logger,
    }),
    logger,
    defaultCluster,
  });
  for (const context of contexts) {
    clusters.register(context);
  }

  const tools = new ToolRegistry();
  for (const descriptor of buildToolCatalog(builtinHandlers)) {
    tools.register(descriptor);
  }

  const engine = new DispatchEngine({
    tools,
    clusters,
    handlers: builtinHandlers,
    logger,
    maxConcurrency: config.maxConcurrency,
    deadlineMs: config.deadlineMs,
    retry: config.retry,
  });

  return { clusters, tools, engine };
}
