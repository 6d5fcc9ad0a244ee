import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type { ClusterRegistry } from "./clusters/registry";
import { ALL_CLUSTERS, type ClusterSelector } from "./clusters/types";
import type { DispatchEngine } from "./dispatch/engine";
import type { AggregatedResponse } from "./dispatch/types";
import type { ToolRegistry } from "./tools/registry";
import type { ParamSpec, ToolDescriptor, ToolParams } from "./tools/types";
import { InvalidParameterError, isFleetError } from "./utils/errors";
import type { Logger } from "./utils/logger";

export const SERVER_NAME = "k8s-fleet-mcp";
export const SERVER_VERSION = "0.1.0";

/** Argument every resource tool takes besides its own parameters. */
export const CLUSTER_ARGUMENT = "cluster";

export const LIST_CLUSTERS_TOOL: Tool = {
  name: "clusters",
  description: "Lists the Kubernetes clusters this server can target, with their API endpoint and default namespace.",
  inputSchema: {
    type: "object",
    properties: {},
    required: [],
  },
};

export interface FleetServerDeps {
  engine: DispatchEngine;
  tools: ToolRegistry;
  clusters: ClusterRegistry;
  logger: Logger;
}

function jsonSchemaOf(spec: ParamSpec): Record<string, unknown> {
  const base = { description: spec.description };
  switch (spec.type) {
    case "string":
      return spec.enum ? { ...base, type: "string", enum: [...spec.enum] } : { ...base, type: "string" };
    case "integer":
    case "number":
    case "boolean":
    case "object":
      return { ...base, type: spec.type };
  }
}

export function toMcpTool(descriptor: ToolDescriptor): Tool {
  const properties: Record<string, object> = {};
  const required: string[] = [];
  for (const [name, spec] of Object.entries(descriptor.params)) {
    properties[name] = jsonSchemaOf(spec);
    if (spec.required) required.push(name);
  }
  properties[CLUSTER_ARGUMENT] = {
    description: `Target cluster: a cluster name, a list of names, or "${ALL_CLUSTERS}". Defaults to the current kubeconfig context.`,
    oneOf: [
      { type: "string" },
      { type: "array", items: { type: "string" }, minItems: 1 },
    ],
  };
  return {
    name: descriptor.name,
    description: descriptor.description,
    inputSchema: { type: "object", properties, required },
  };
}

export function listTools(tools: ToolRegistry): Tool[] {
  return [LIST_CLUSTERS_TOOL, ...tools.list().map(toMcpTool)];
}

export function parseSelector(value: unknown): ClusterSelector | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  if (Array.isArray(value) && value.length > 0 && value.every((item) => typeof item === "string" && item !== "")) {
    return value.filter((item): item is string => typeof item === "string");
  }
  throw new InvalidParameterError(CLUSTER_ARGUMENT, `must be a cluster name, a non-empty list of names, or "${ALL_CLUSTERS}"`);
}

function textResult(body: unknown, isError: boolean): CallToolResult {
  return {
    content: [{
      type: "text",
      text: JSON.stringify(body, null, 2),
    }],
    isError,
  };
}

export function listClusters(clusters: ClusterRegistry): CallToolResult {
  const defaultCluster = clusters.defaultCluster;
  const rows = clusters.list().map((context) => ({
    name: context.name,
    endpoint: context.endpoint,
    defaultNamespace: context.defaultNamespace,
    default: context.name === defaultCluster,
  }));
  return textResult(rows, false);
}

/**
 * Handles one MCP tool call. The reply text is the aggregated response as
 * JSON; `isError` is set for any status other than success, so partial
 * fleet failures are flagged and still carry every cluster's result.
 */
export async function callTool(deps: FleetServerDeps, name: string, args: Record<string, unknown>): Promise<CallToolResult> {
  if (name === LIST_CLUSTERS_TOOL.name) {
    return listClusters(deps.clusters);
  }

  const params: ToolParams = { ...args };
  delete params[CLUSTER_ARGUMENT];

  try {
    const response = await deps.engine.dispatch({
      tool: name,
      params,
      clusters: parseSelector(args[CLUSTER_ARGUMENT]),
    });
    return textResult(response, response.status !== "success");
  } catch (error) {
    if (!isFleetError(error)) {
      throw error;
    }
    deps.logger.info({ tool: name, err: error }, "tool call rejected");
    const response: AggregatedResponse = { tool: name, status: "failure", results: [], error: error.toDetail() };
    return textResult(response, true);
  }
}

export function createServer(deps: FleetServerDeps): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listTools(deps.tools),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    callTool(deps, request.params.name, request.params.arguments ?? {}));

  return server;
}
