/**
 * Endpoint parser - turns absolute URL lines into EndpointRecords
 */

import type { EndpointRecord } from "../../types/data-model.js";
import { MalformedEndpointError } from "../../utils/errors.js";
import type { EndpointParserOptions } from "./types.js";

const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):(.*)$/s;
const PORT_PATTERN = /^\d+$/;

interface Authority {
  host: string;
  port: string | undefined;
}

/**
 * Split "user@host:port" into host and port. IPv6 literals keep their
 * colons and lose their brackets.
 */
function splitAuthority(authority: string): Authority {
  const hostPort = authority.slice(authority.lastIndexOf("@") + 1);

  if (hostPort.startsWith("[")) {
    const close = hostPort.indexOf("]");
    if (close === -1) {
      return { host: "", port: undefined };
    }
    const rest = hostPort.slice(close + 1);
    return {
      host: hostPort.slice(1, close),
      port: rest.startsWith(":") ? rest.slice(1) : undefined,
    };
  }

  const colon = hostPort.lastIndexOf(":");
  if (colon === -1) {
    return { host: hostPort, port: undefined };
  }
  return { host: hostPort.slice(0, colon), port: hostPort.slice(colon + 1) };
}

/**
 * Parse a single endpoint line
 *
 * @throws MalformedEndpointError naming the line and the defect
 */
export function parseEndpoint(
  line: string,
  options: EndpointParserOptions,
): EndpointRecord {
  const raw = line.trim();

  const schemeMatch = SCHEME_PATTERN.exec(raw);
  if (!schemeMatch) {
    throw new MalformedEndpointError(
      raw,
      "missing-scheme",
      `Invalid endpoint '${raw}': missing scheme. Expected absolute URL.`,
    );
  }
  const scheme = (schemeMatch[1] ?? "").toLowerCase();
  const remainder = schemeMatch[2] ?? "";

  if (!remainder.startsWith("//")) {
    throw new MalformedEndpointError(
      raw,
      "missing-authority",
      `Invalid endpoint '${raw}': missing authority. Expected absolute URL.`,
    );
  }

  const afterSlashes = remainder.slice(2);
  const authorityEnd = afterSlashes.search(/[/?#]/);
  const authority =
    authorityEnd === -1 ? afterSlashes : afterSlashes.slice(0, authorityEnd);
  const tail = authorityEnd === -1 ? "" : afterSlashes.slice(authorityEnd);

  if (authority === "") {
    throw new MalformedEndpointError(
      raw,
      "missing-authority",
      `Invalid endpoint '${raw}': missing authority. Expected absolute URL.`,
    );
  }

  const { host, port: portText } = splitAuthority(authority);
  if (host === "") {
    throw new MalformedEndpointError(
      raw,
      "missing-host",
      `Invalid endpoint '${raw}': missing host.`,
    );
  }

  let port: number;
  if (portText === undefined || portText === "") {
    const implied = options.defaultPorts[scheme];
    if (implied === undefined) {
      throw new MalformedEndpointError(
        raw,
        "missing-port",
        `Endpoint '${raw}' missing explicit port.`,
      );
    }
    port = implied;
  } else {
    port = PORT_PATTERN.test(portText) ? Number(portText) : Number.NaN;
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new MalformedEndpointError(
        raw,
        "invalid-port",
        `Endpoint '${raw}' has invalid port '${portText}'.`,
      );
    }
  }

  const pathEnd = tail.search(/[?#]/);
  const path = pathEnd === -1 ? tail : tail.slice(0, pathEnd);

  return Object.freeze({
    scheme,
    host: host.toLowerCase(),
    port,
    path: path || "/",
    raw,
  });
}

/**
 * Parse every line, preserving order. The first malformed line aborts the batch.
 */
export function parseEndpoints(
  lines: readonly string[],
  options: EndpointParserOptions,
): EndpointRecord[] {
  return lines.map((line) => parseEndpoint(line, options));
}
