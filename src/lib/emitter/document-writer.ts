/**
 * Document writer - serializes configuration documents with key order
 * preserved and every repeated substructure written out in full
 */

import { rename, unlink, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";
import { stringify as stringifyYaml } from "yaml";
import type { ConfigValue } from "../../types/data-model.js";
import { StorageError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { DocumentFormat, WriteResult } from "./types.js";

const STDOUT_TARGETS = new Set(["-", "stdout"]);

export function isStdoutTarget(path: string): boolean {
  return STDOUT_TARGETS.has(path);
}

export function formatForPath(path: string): DocumentFormat {
  return path.toLowerCase().endsWith(".json") ? "json" : "yaml";
}

export function serializeDocument(document: ConfigValue, format: DocumentFormat): string {
  if (format === "json") {
    return JSON.stringify(document, null, 2) + "\n";
  }
  // No anchors/aliases: each copy must stay independently editable
  return stringifyYaml(document, { aliasDuplicateObjects: false, indent: 2 });
}

/**
 * Write a document to `path` (or stdout for "-"/"stdout").
 *
 * File output goes to a temporary sibling first and is renamed into place,
 * so a failed write never leaves a partial document behind.
 */
export async function saveDocument(document: ConfigValue, path: string): Promise<WriteResult> {
  if (isStdoutTarget(path)) {
    const content = serializeDocument(document, "yaml");
    process.stdout.write(content);
    return { destination: "stdout", format: "yaml", bytes: Buffer.byteLength(content) };
  }

  const format = formatForPath(path);
  const content = serializeDocument(document, format);
  const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);

  try {
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, path);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      logger.debug("Temporary output not removed", { tempPath, error: String(cleanupError) });
    });
    throw new StorageError(`Failed to write document: ${path}`, { path }, { cause: error });
  }

  logger.debug("Wrote document", { path, format, bytes: Buffer.byteLength(content) });
  return { destination: path, format, bytes: Buffer.byteLength(content) };
}
