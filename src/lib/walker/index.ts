/**
 * Walker module - re-targets identifier fields (url/host) across any
 * configuration tree in two pure passes: collect, then rewrite.
 */

import { DEFAULT_ENGINE_CONFIG } from "../../types/config.js";
import type { ConfigValue } from "../../types/data-model.js";
import { NoReplacementsAvailableError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { fromNode, toNode, visitNode } from "./nodes.js";
import type {
  ConfigNode,
  SubstitutionOptions,
  SubstitutionResult,
} from "./types.js";

export * from "./types.js";
export * from "./nodes.js";

function identifierOf(key: string, child: ConfigNode, keys: ReadonlySet<string>): string | undefined {
  if (keys.has(key) && child.kind === "scalar" && typeof child.value === "string") {
    return child.value;
  }
  return undefined;
}

/**
 * Depth-first, in-order list of every string found under an identifier key.
 * Duplicates are kept.
 */
export function collectIdentifiers(
  node: ConfigNode,
  identifierKeys: readonly string[] = DEFAULT_ENGINE_CONFIG.identifierKeys,
): string[] {
  const keys = new Set(identifierKeys);

  const collect = (current: ConfigNode): string[] =>
    visitNode<string[]>(current, {
      mapping: ({ entries }) =>
        entries.flatMap(([key, child]) => {
          const identifier = identifierOf(key, child, keys);
          return identifier === undefined ? collect(child) : [identifier];
        }),
      sequence: ({ items }) => items.flatMap(collect),
      scalar: () => [],
    });

  return collect(node);
}

/**
 * One replacement per distinct original, assigned in first-occurrence order
 * from a replacement sequence that wraps around when exhausted.
 */
export function buildSubstitutionMap(
  originals: readonly string[],
  replacements: readonly string[],
): Map<string, string> {
  const mapping = new Map<string, string>();
  if (replacements.length === 0) {
    return mapping;
  }

  let cursor = 0;
  for (const original of originals) {
    if (mapping.has(original)) {
      continue;
    }
    const replacement = replacements[cursor % replacements.length];
    if (replacement !== undefined) {
      mapping.set(original, replacement);
    }
    cursor += 1;
  }
  return mapping;
}

/**
 * New tree of the same shape with mapped identifiers swapped in
 */
export function rewriteIdentifiers(
  node: ConfigNode,
  mapping: ReadonlyMap<string, string>,
  identifierKeys: readonly string[] = DEFAULT_ENGINE_CONFIG.identifierKeys,
): ConfigNode {
  const keys = new Set(identifierKeys);

  const rewrite = (current: ConfigNode): ConfigNode =>
    visitNode<ConfigNode>(current, {
      mapping: ({ entries }) => ({
        kind: "mapping",
        entries: entries.map(([key, child]) => {
          const identifier = identifierOf(key, child, keys);
          const replacement = identifier === undefined ? undefined : mapping.get(identifier);
          const next: ConfigNode =
            replacement === undefined
              ? rewrite(child)
              : { kind: "scalar", value: replacement };
          return [key, next] as const;
        }),
      }),
      sequence: ({ items }) => ({ kind: "sequence", items: items.map(rewrite) }),
      scalar: ({ value }) => ({ kind: "scalar", value }),
    });

  return rewrite(node);
}

/**
 * Replace every identifier value in `tree` using `replacements`.
 *
 * The input is left untouched. A tree without identifiers comes back as an
 * equal copy with status "unchanged".
 *
 * @throws NoReplacementsAvailableError when identifiers exist but no replacements were given
 */
export function substituteIdentifiers(
  tree: ConfigValue,
  replacements: readonly string[],
  options: SubstitutionOptions = {},
): SubstitutionResult {
  const identifierKeys = options.identifierKeys ?? DEFAULT_ENGINE_CONFIG.identifierKeys;
  const root = toNode(tree);
  const found = collectIdentifiers(root, identifierKeys);
  const distinct = new Set(found).size;

  if (found.length === 0) {
    logger.info("No identifiers found to replace", { keys: identifierKeys });
    return {
      status: "unchanged",
      document: fromNode(root),
      occurrences: 0,
      distinct: 0,
      mapping: new Map(),
    };
  }

  if (replacements.length === 0) {
    throw new NoReplacementsAvailableError(
      `Found ${found.length} identifiers to replace but no replacements were supplied`,
      { occurrences: found.length, distinct },
    );
  }

  const mapping = buildSubstitutionMap(found, replacements);
  const document = fromNode(rewriteIdentifiers(root, mapping, identifierKeys));

  logger.info("Replaced identifiers", {
    occurrences: found.length,
    distinct,
    replacements: replacements.length,
  });

  return { status: "substituted", document, occurrences: found.length, distinct, mapping };
}
