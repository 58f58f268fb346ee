/**
 * Endpoint sources - local text files and remote HTTP resources, one entry per line
 */

import { readFile } from "fs/promises";
import { DEFAULT_ENGINE_CONFIG } from "../../types/config.js";
import { StorageError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { EndpointSourceOptions } from "./types.js";

/**
 * Split line-oriented text into trimmed, non-blank entries
 */
export function splitEndpointLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

export async function loadEndpointsFromFile(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new StorageError(
      `Failed to read endpoints file: ${path}`,
      { source: path },
      { cause: error },
    );
  }

  const lines = splitEndpointLines(content);
  logger.debug("Loaded endpoints from file", { path, count: lines.length });
  return lines;
}

export async function loadEndpointsFromUrl(
  url: string,
  timeoutMs: number = DEFAULT_ENGINE_CONFIG.fetchTimeoutMs,
): Promise<string[]> {
  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new StorageError(
      `Failed to fetch endpoints from ${url}`,
      { source: url, timeoutMs },
      { cause: error },
    );
  }

  if (!response.ok) {
    throw new StorageError(
      `Failed to fetch endpoints from ${url}: HTTP ${response.status}`,
      { source: url, status: response.status },
    );
  }

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw new StorageError(
      `Failed to read endpoints response from ${url}`,
      { source: url },
      { cause: error },
    );
  }

  const lines = splitEndpointLines(body);
  logger.debug("Loaded endpoints from URL", { url, count: lines.length });
  return lines;
}

/**
 * Read the whole endpoint list before anything parses it
 */
export async function loadEndpoints(options: EndpointSourceOptions): Promise<string[]> {
  return options.kind === "url"
    ? loadEndpointsFromUrl(options.location, options.timeoutMs)
    : loadEndpointsFromFile(options.location);
}
