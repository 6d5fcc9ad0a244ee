import { DuplicateToolError, InvalidParameterError, UnknownToolError } from "../utils/errors";
import { ToolRegistry } from "./registry";
import type { ToolDescriptor } from "./types";

const deletePods: ToolDescriptor = {
  name: "delete_pods",
  description: "Delete a Pod.",
  kind: "pods",
  verb: "delete",
  params: {
    name: { type: "string", required: true, description: "Pod name." },
    namespace: { type: "string", required: false, description: "Namespace." },
    propagationPolicy: {
      type: "string",
      required: false,
      description: "Propagation.",
      enum: ["Foreground", "Background", "Orphan"],
    },
    gracePeriod: { type: "integer", required: false, description: "Seconds." },
  },
};

function registry() {
  const tools = new ToolRegistry();
  tools.register(deletePods);
  return tools;
}

function validationError(params: Record<string, unknown>): InvalidParameterError {
  try {
    registry().validate({ tool: "delete_pods", params });
  } catch (error) {
    if (error instanceof InvalidParameterError) return error;
    throw error;
  }
  throw new Error("expected validation to fail");
}

describe("ToolRegistry", () => {
  it("registers and lists descriptors", () => {
    const tools = registry();

    expect(tools.size).toBe(1);
    expect(tools.get("delete_pods")).toEqual(deletePods);
    expect(tools.list().map((tool) => tool.name)).toEqual(["delete_pods"]);
  });

  it("rejects a duplicate name", () => {
    expect(() => registry().register(deletePods)).toThrow(DuplicateToolError);
  });

  it("returns the descriptor of a valid invocation", () => {
    const descriptor = registry().validate({
      tool: "delete_pods",
      params: { name: "web", propagationPolicy: "Orphan", gracePeriod: 30 },
    });

    expect(descriptor.name).toBe("delete_pods");
  });

  it("rejects an unknown tool", () => {
    expect(() => registry().validate({ tool: "list_widgets", params: {} })).toThrow(new UnknownToolError("list_widgets"));
  });

  it("reports a missing required parameter", () => {
    const error = validationError({ namespace: "shop" });

    expect(error.parameter).toBe("name");
    expect(error.message).toBe("Invalid parameter 'name': is required");
  });

  it("reports an undeclared parameter", () => {
    const error = validationError({ name: "web", force: true });

    expect(error.message).toBe("Invalid parameter 'force': unknown parameter");
  });

  it("reports a value outside the allowed set", () => {
    const error = validationError({ name: "web", propagationPolicy: "Later" });

    expect(error.message).toBe("Invalid parameter 'propagationPolicy': must be one of Foreground, Background, Orphan");
  });

  it("reports a mistyped value", () => {
    expect(validationError({ name: 7 }).parameter).toBe("name");
    expect(validationError({ name: "web", gracePeriod: 2.5 }).parameter).toBe("gracePeriod");
  });
});
