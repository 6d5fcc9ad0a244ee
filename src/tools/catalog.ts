import { supportedVerbs } from "../resources";
import type { KubeResourceSchema } from "../resources/schema";
import type { ResourceHandler, Verb } from "../resources/types";
import type { ParamSpec, ToolDescriptor } from "./types";

const PROPAGATION_POLICIES = ["Foreground", "Background", "Orphan"] as const;

function namespaceParam(schema: KubeResourceSchema): Record<string, ParamSpec> {
  if (!schema.namespaced) return {};
  return {
    namespace: {
      type: "string",
      required: false,
      description: "Namespace of the resource. Defaults to the cluster context's namespace.",
    },
  };
}

function nameParam(schema: KubeResourceSchema): Record<string, ParamSpec> {
  return {
    name: { type: "string", required: true, description: `Name of the ${schema.singular}.` },
  };
}

function describe(verb: Verb, schema: KubeResourceSchema): string {
  switch (verb) {
    case "list":
      return `List ${schema.plural} with a summary of their status.`;
    case "get":
      return `Get the full ${schema.kind} object.`;
    case "create":
      return `Create a ${schema.kind} from a manifest.`;
    case "update":
      return `Replace an existing ${schema.kind} with a manifest.`;
    case "delete":
      return `Delete a ${schema.kind}.`;
    case "scale":
      return `Set the replica count of a ${schema.kind}.`;
    case "logs":
      return `Read the logs of a ${schema.kind}'s container.`;
    case "events":
      return `List the events recorded for a ${schema.kind}.`;
    case "rollout_status":
      return `Report whether a ${schema.kind} has rolled out its desired replicas.`;
  }
}

function paramsFor(verb: Verb, schema: KubeResourceSchema): Record<string, ParamSpec> {
  switch (verb) {
    case "list": {
      const params: Record<string, ParamSpec> = {
        ...namespaceParam(schema),
        labelSelector: { type: "string", required: false, description: "Label selector, e.g. app=web,tier!=cache." },
        fieldSelector: { type: "string", required: false, description: "Field selector, e.g. status.phase=Running." },
        limit: { type: "integer", required: false, description: "Maximum number of items to return." },
      };
      if (schema.namespaced) {
        params.allNamespaces = {
          type: "boolean",
          required: false,
          description: "List across all namespaces instead of a single one.",
        };
      }
      return params;
    }
    case "get":
      return { ...nameParam(schema), ...namespaceParam(schema) };
    case "create":
      return {
        manifest: { type: "object", required: true, description: `${schema.kind} manifest.` },
        ...namespaceParam(schema),
      };
    case "update":
      return {
        ...nameParam(schema),
        manifest: { type: "object", required: true, description: `Complete ${schema.kind} manifest replacing the current one.` },
        ...namespaceParam(schema),
      };
    case "delete":
      return {
        ...nameParam(schema),
        ...namespaceParam(schema),
        propagationPolicy: {
          type: "string",
          required: false,
          enum: PROPAGATION_POLICIES,
          description: "How dependents are deleted. Defaults to Foreground.",
        },
      };
    case "scale":
      return {
        ...nameParam(schema),
        replicas: { type: "integer", required: true, description: "Desired number of replicas." },
        ...namespaceParam(schema),
      };
    case "logs":
      return {
        ...nameParam(schema),
        ...namespaceParam(schema),
        container: { type: "string", required: false, description: "Container name; needed when the pod has several." },
        tailLines: { type: "integer", required: false, description: "Number of lines from the end of the log." },
        previous: { type: "boolean", required: false, description: "Logs of the previous, terminated container." },
        timestamps: { type: "boolean", required: false, description: "Prefix each line with its RFC3339 timestamp." },
      };
    case "events":
    case "rollout_status":
      return { ...nameParam(schema), ...namespaceParam(schema) };
  }
}

export function toolName(verb: Verb, schema: KubeResourceSchema): string {
  return `${verb}_${schema.plural}`;
}

/**
 * One tool per (resource kind, supported verb), named `<verb>_<plural>`.
 */
export function buildToolCatalog(handlers: readonly ResourceHandler[]): ToolDescriptor[] {
  return handlers.flatMap((handler) =>
    supportedVerbs(handler).map((verb) => ({
      name: toolName(verb, handler.schema),
      description: describe(verb, handler.schema),
      kind: handler.schema.plural,
      verb,
      params: paramsFor(verb, handler.schema),
    })),
  );
}
