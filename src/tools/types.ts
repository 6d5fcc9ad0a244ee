import type { ClusterSelector } from "../clusters/types";
import type { Verb } from "../resources/types";

export type ParamType = "string" | "integer" | "number" | "boolean" | "object";

export interface ParamSpec {
  type: ParamType;
  required: boolean;
  description: string;
  /** Allowed values of a string parameter. */
  enum?: readonly string[];
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  /** Plural resource name of the handler serving the tool, e.g. `pods`. */
  readonly kind: string;
  readonly verb: Verb;
  readonly params: Readonly<Record<string, ParamSpec>>;
}

export type ToolParams = Record<string, unknown>;

export interface ToolInvocation {
  tool: string;
  params: ToolParams;
  /** The registry's default cluster when omitted. */
  clusters?: ClusterSelector;
}
