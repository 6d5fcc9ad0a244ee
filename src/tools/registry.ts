import { z } from "zod";
import { DuplicateToolError, InvalidParameterError, UnknownToolError } from "../utils/errors";
import type { ParamSpec, ToolDescriptor, ToolInvocation } from "./types";

function baseSchema(spec: ParamSpec): z.ZodTypeAny {
  switch (spec.type) {
    case "string": {
      const allowed = spec.enum;
      return allowed
        ? z.string().refine((value) => allowed.includes(value), {
          message: `must be one of ${allowed.join(", ")}`,
        })
        : z.string();
    }
    case "integer":
      return z.number().int();
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
    case "object":
      return z.record(z.unknown());
  }
}

function paramSchema(spec: ParamSpec): z.ZodTypeAny {
  const schema = baseSchema(spec);
  return spec.required ? schema : schema.optional();
}

function compile(descriptor: ToolDescriptor): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(descriptor.params)) {
    shape[name] = paramSchema(spec);
  }
  return z.object(shape).strict();
}

function toInvalidParameter(issue: z.ZodIssue): InvalidParameterError {
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return new InvalidParameterError(issue.keys[0] ?? "", "unknown parameter");
  }
  const parameter = String(issue.path[0] ?? "");
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined) {
    return new InvalidParameterError(parameter, "is required");
  }
  return new InvalidParameterError(parameter, issue.message);
}

interface RegisteredTool {
  descriptor: ToolDescriptor;
  schema: z.ZodTypeAny;
}

/**
 * Static table of tools, filled at startup. Validation rejects unknown
 * tools, missing or mistyped parameters, and parameters the tool does not
 * declare.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register(descriptor: ToolDescriptor): void {
    if (this.tools.has(descriptor.name)) {
      throw new DuplicateToolError(descriptor.name);
    }
    const frozen: ToolDescriptor = Object.freeze({
      ...descriptor,
      params: Object.freeze({ ...descriptor.params }),
    });
    this.tools.set(descriptor.name, { descriptor: frozen, schema: compile(frozen) });
  }

  get size(): number {
    return this.tools.size;
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name)?.descriptor;
  }

  list(): ToolDescriptor[] {
    return Array.from(this.tools.values(), (tool) => tool.descriptor);
  }

  validate(invocation: ToolInvocation): ToolDescriptor {
    const tool = this.tools.get(invocation.tool);
    if (!tool) {
      throw new UnknownToolError(invocation.tool);
    }

    const result = tool.schema.safeParse(invocation.params);
    if (!result.success) {
      const [issue] = result.error.issues;
      throw issue
        ? toInvalidParameter(issue)
        : new InvalidParameterError("", result.error.message);
    }
    return tool.descriptor;
  }
}
