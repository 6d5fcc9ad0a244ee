#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express from "express";
import { loadConfig, type Config } from "./config";
import { buildFleet } from "./fleet";
import { createServer, type FleetServerDeps } from "./server";
import { createLogger, type Logger } from "./utils/logger";
import { contextsFromKubeConfig, loadKubeConfig } from "./utils/kubeconfig";

async function runStdio(deps: FleetServerDeps, logger: Logger) {
  const server = createServer(deps);
  await server.connect(new StdioServerTransport());
  logger.info("fleet MCP server running on stdio");
}

/**
 * Stateless streamable HTTP: each request gets its own server and transport.
 */
function runHttp(deps: FleetServerDeps, config: Config, logger: Logger) {
  const app = express();
  app.use(express.json({ limit: "4mb" }));

  app.post("/mcp", async (req, res) => {
    const server = createServer(deps);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on("close", () => {
      transport.close().catch((error: unknown) => logger.warn({ err: error }, "closing transport failed"));
      server.close().catch((error: unknown) => logger.warn({ err: error }, "closing server failed"));
    });
    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error({ err: error }, "error handling MCP request");
      if (!res.headersSent) {
        res.status(500).json({ error: "Internal server error" });
      }
    }
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", transport: "streamable-http", clusters: deps.clusters.size });
  });

  app.listen(config.port, config.host, () => {
    logger.info({ host: config.host, port: config.port }, "fleet MCP server listening; POST /mcp, GET /health");
  });
}

async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  const kc = loadKubeConfig(config.kubeconfigPath);
  const contexts = contextsFromKubeConfig(kc, {
    path: config.kubeconfigPath,
    contexts: config.contexts,
    defaultNamespace: config.defaultNamespace,
  });
  const currentContext = kc.getCurrentContext();
  const fleet = buildFleet({
    config,
    logger,
    contexts,
    defaultCluster: contexts.some((context) => context.name === currentContext) ? currentContext : undefined,
  });
  logger.info({ clusters: fleet.clusters.list().map((context) => context.name), tools: fleet.tools.size }, "fleet loaded");

  const deps: FleetServerDeps = { ...fleet, logger };
  if (config.transport === "http") {
    runHttp(deps, config, logger);
  } else {
    await runStdio(deps, logger);
  }
}

main().catch((error: unknown) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
