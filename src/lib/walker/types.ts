/**
 * Walker module types
 */

import type { ConfigScalar, ConfigValue } from "../../types/data-model.js";

export interface MappingNode {
  kind: "mapping";
  entries: ReadonlyArray<readonly [string, ConfigNode]>;
}

export interface SequenceNode {
  kind: "sequence";
  items: readonly ConfigNode[];
}

export interface ScalarNode {
  kind: "scalar";
  value: ConfigScalar;
}

/**
 * Closed set of node variants a configuration tree is made of
 */
export type ConfigNode = MappingNode | SequenceNode | ScalarNode;

export interface ConfigNodeVisitor<R> {
  mapping(node: MappingNode): R;
  sequence(node: SequenceNode): R;
  scalar(node: ScalarNode): R;
}

export interface SubstitutionOptions {
  /** Keys whose string values are identifiers; defaults to url and host */
  identifierKeys?: readonly string[];
}

export type SubstitutionStatus = "substituted" | "unchanged";

export interface SubstitutionResult {
  status: SubstitutionStatus;
  document: ConfigValue;
  /** Every identifier occurrence found, duplicates included */
  occurrences: number;
  distinct: number;
  mapping: ReadonlyMap<string, string>;
}
