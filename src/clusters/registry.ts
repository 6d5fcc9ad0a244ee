import {
  AuthenticationError,
  DuplicateClusterError,
  UnknownClusterError,
  errorMessage,
} from "../utils/errors";
import type { Logger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import {
  ALL_CLUSTERS,
  type ClientCapability,
  type ClusterContext,
  type ClusterSelector,
  type CredentialSource,
} from "./types";

export interface ClusterRegistryOptions {
  credentials: CredentialSource;
  logger?: Logger;
  /** Cluster targeted when an invocation names none; the first registered cluster otherwise. */
  defaultCluster?: string;
}

/**
 * Holds the named cluster contexts for the lifetime of the process and hands
 * out one cached capability per context.
 */
export class ClusterRegistry {
  private readonly contexts = new Map<string, ClusterContext>();
  private readonly capabilities = new Map<string, Promise<ClientCapability>>();
  private readonly credentials: CredentialSource;
  private readonly logger: Logger;
  private preferredDefault?: string;

  constructor({ credentials, logger = silentLogger, defaultCluster }: ClusterRegistryOptions) {
    this.credentials = credentials;
    this.logger = logger.child({ component: "cluster-registry" });
    this.preferredDefault = defaultCluster;
  }

  register(context: ClusterContext): void {
    if (this.contexts.has(context.name)) {
      throw new DuplicateClusterError(context.name);
    }
    const frozen: ClusterContext = Object.freeze({
      ...context,
      credential: Object.freeze({ ...context.credential }),
    });
    this.contexts.set(context.name, frozen);
    this.logger.debug({ cluster: context.name, endpoint: context.endpoint }, "registered cluster");
  }

  get size(): number {
    return this.contexts.size;
  }

  get(name: string): ClusterContext | undefined {
    return this.contexts.get(name);
  }

  list(): ClusterContext[] {
    return Array.from(this.contexts.values());
  }

  get defaultCluster(): string | undefined {
    if (this.preferredDefault && this.contexts.has(this.preferredDefault)) {
      return this.preferredDefault;
    }
    return this.contexts.keys().next().value;
  }

  set defaultCluster(name: string | undefined) {
    if (name !== undefined && !this.contexts.has(name)) {
      throw new UnknownClusterError(name);
    }
    this.preferredDefault = name;
  }

  /**
   * Resolves a selector to contexts in a deterministic order: registration
   * order for "all", selector order otherwise, with repeated names kept at
   * their first position.
   */
  resolve(selector: ClusterSelector): ClusterContext[] {
    if (selector === ALL_CLUSTERS) {
      return this.list();
    }

    const names = typeof selector === "string" ? [selector] : selector;
    const seen = new Set<string>();
    const resolved: ClusterContext[] = [];
    for (const name of names) {
      const context = this.contexts.get(name);
      if (!context) {
        throw new UnknownClusterError(name);
      }
      if (!seen.has(name)) {
        seen.add(name);
        resolved.push(context);
      }
    }
    return resolved;
  }

  /**
   * Returns the cached capability for a context, building it on first use.
   * Concurrent first calls share one construction; a failed construction is
   * evicted so the next call tries again.
   */
  capability(context: ClusterContext): Promise<ClientCapability> {
    const cached = this.capabilities.get(context.name);
    if (cached) {
      return cached;
    }

    const pending = this.connect(context);
    this.capabilities.set(context.name, pending);
    pending.catch(() => {
      if (this.capabilities.get(context.name) === pending) {
        this.capabilities.delete(context.name);
      }
    });
    return pending;
  }

  invalidate(name: string): boolean {
    return this.capabilities.delete(name);
  }

  private async connect(context: ClusterContext): Promise<ClientCapability> {
    const registered = this.contexts.get(context.name);
    if (!registered) {
      throw new UnknownClusterError(context.name);
    }

    this.logger.debug({ cluster: context.name }, "connecting to cluster");
    try {
      const capability = await this.credentials.connect(registered);
      this.logger.info({ cluster: context.name }, "cluster capability ready");
      return capability;
    } catch (error) {
      this.logger.warn({ cluster: context.name, err: error }, "cluster capability failed");
      if (error instanceof AuthenticationError) {
        throw error;
      }
      throw new AuthenticationError(context.name, errorMessage(error), { cause: error });
    }
  }
}
