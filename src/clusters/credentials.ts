import { buildKubeConfig } from "../utils/kubeconfig";
import { AuthenticationError, errorMessage } from "../utils/errors";
import type { Logger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { KubeClientCapability, probeServerVersion } from "./kube-capability";
import type { ClientCapability, ClusterContext, CredentialSource } from "./types";

export interface KubeconfigCredentialSourceOptions {
  /** Probe the API server's version before handing out a capability. */
  verify?: boolean;
  skipTlsVerify?: boolean;
  logger?: Logger;
}

export class KubeconfigCredentialSource implements CredentialSource {
  private readonly verify: boolean;
  private readonly skipTlsVerify: boolean;
  private readonly logger: Logger;

  constructor({ verify = true, skipTlsVerify = false, logger = silentLogger }: KubeconfigCredentialSourceOptions = {}) {
    this.verify = verify;
    this.skipTlsVerify = skipTlsVerify;
    this.logger = logger;
  }

  async connect(context: ClusterContext): Promise<ClientCapability> {
    const kc = buildKubeConfig(context, { skipTlsVerify: this.skipTlsVerify });

    if (this.verify) {
      try {
        const version = await probeServerVersion(kc);
        this.logger.debug({ cluster: context.name, version }, "verified cluster credentials");
      } catch (error) {
        throw new AuthenticationError(context.name, errorMessage(error), { cause: error });
      }
    }

    return new KubeClientCapability(context.name, kc);
  }
}
