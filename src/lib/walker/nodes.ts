/**
 * Conversion between plain configuration values and ConfigNode trees
 */

import type { ConfigMapping, ConfigValue } from "../../types/data-model.js";
import type { ConfigNode, ConfigNodeVisitor } from "./types.js";

export function visitNode<R>(node: ConfigNode, visitor: ConfigNodeVisitor<R>): R {
  switch (node.kind) {
    case "mapping":
      return visitor.mapping(node);
    case "sequence":
      return visitor.sequence(node);
    case "scalar":
      return visitor.scalar(node);
  }
}

export function toNode(value: ConfigValue): ConfigNode {
  if (Array.isArray(value)) {
    return { kind: "sequence", items: value.map(toNode) };
  }
  if (typeof value === "object" && value !== null) {
    return {
      kind: "mapping",
      entries: Object.entries(value).map(([key, child]) => [key, toNode(child)] as const),
    };
  }
  return { kind: "scalar", value };
}

export function fromNode(node: ConfigNode): ConfigValue {
  return visitNode<ConfigValue>(node, {
    mapping: ({ entries }): ConfigMapping =>
      Object.fromEntries(
        entries.map(([key, child]): [string, ConfigValue] => [key, fromNode(child)]),
      ),
    sequence: ({ items }) => items.map(fromNode),
    scalar: ({ value }) => value,
  });
}
