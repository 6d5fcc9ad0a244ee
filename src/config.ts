import { z } from "zod";
import { MAX_TIMER_MS } from "./utils/abort";
import { ConfigurationError } from "./utils/errors";

const TransportSchema = z.enum(["stdio", "http"]);
export type Transport = z.infer<typeof TransportSchema>;

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const ConfigSchema = z.object({
  transport: TransportSchema.default("stdio"),
  host: z.string().min(1).default("0.0.0.0"),
  port: z.number().int().positive().max(65535).default(8080),
  kubeconfigPath: z.string().min(1).optional(),
  contexts: z.array(z.string().min(1)).optional(),
  defaultNamespace: z.string().min(1).default("default"),
  maxConcurrency: z.number().int().positive().default(8),
  deadlineMs: z.number().int().positive().max(MAX_TIMER_MS).default(30000),
  retry: z.object({
    attempts: z.number().int().positive().default(3),
    baseDelayMs: z.number().int().nonnegative().default(200),
    maxDelayMs: z.number().int().nonnegative().default(2000),
  }),
  verifyCredentials: z.boolean().default(true),
  skipTlsVerify: z.boolean().default(false),
  logLevel: LogLevelSchema.default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function numberFrom(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

function booleanFrom(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function listFrom(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value.split(",").map((item) => item.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function stringFrom(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    transport: stringFrom(env.MCP_TRANSPORT),
    host: stringFrom(env.HOST),
    port: numberFrom(env.PORT),
    kubeconfigPath: stringFrom(env.KUBECONFIG),
    contexts: listFrom(env.FLEET_CONTEXTS),
    defaultNamespace: stringFrom(env.FLEET_DEFAULT_NAMESPACE),
    maxConcurrency: numberFrom(env.FLEET_MAX_CONCURRENCY),
    deadlineMs: numberFrom(env.FLEET_DEADLINE_MS),
    retry: {
      attempts: numberFrom(env.FLEET_RETRY_ATTEMPTS),
      baseDelayMs: numberFrom(env.FLEET_RETRY_BASE_DELAY_MS),
      maxDelayMs: numberFrom(env.FLEET_RETRY_MAX_DELAY_MS),
    },
    verifyCredentials: booleanFrom(env.FLEET_VERIFY_CREDENTIALS),
    skipTlsVerify: booleanFrom(env.FLEET_SKIP_TLS_VERIFY),
    logLevel: stringFrom(env.LOG_LEVEL),
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigurationError(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}
