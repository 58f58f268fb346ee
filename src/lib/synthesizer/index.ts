/**
 * Synthesizer module - builds monitor definitions from endpoint records
 */

import type {
  EndpointRecord,
  HttpMonitor,
  IcmpMonitor,
  MonitorDefinition,
  TcpMonitor,
} from "../../types/data-model.js";
import { EmptyInputError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { computeDistribution, partitionEndpoints } from "../allocator/index.js";
import { parseEndpoints } from "../endpoints/parser.js";
import { HTTP_TEMPLATE, ICMP_TEMPLATE, TCP_TEMPLATE } from "./templates.js";
import type { EndpointGroups, SynthesizerOptions, SynthesizerResult } from "./types.js";

export * from "./types.js";
export * from "./templates.js";

/**
 * Five-digit, zero-padded, 1-based sequence number
 */
export function formatMonitorIndex(index: number): string {
  return String(index).padStart(5, "0");
}

export function buildHttpMonitor(endpoint: EndpointRecord, index: number): HttpMonitor {
  const monitor = structuredClone<HttpMonitor>(HTTP_TEMPLATE);
  monitor.name = `HTTP Monitor ${formatMonitorIndex(index)} (port ${endpoint.port})`;
  monitor.pulse_check.config.url = endpoint.raw;
  return monitor;
}

export function buildTcpMonitor(endpoint: EndpointRecord, index: number): TcpMonitor {
  const monitor = structuredClone<TcpMonitor>(TCP_TEMPLATE);
  monitor.name = `TCP Monitor ${formatMonitorIndex(index)} (port ${endpoint.port})`;
  monitor.pulse_check.config.host = endpoint.host;
  monitor.pulse_check.config.port = endpoint.port;
  return monitor;
}

export function buildIcmpMonitor(endpoint: EndpointRecord, index: number): IcmpMonitor {
  const monitor = structuredClone<IcmpMonitor>(ICMP_TEMPLATE);
  monitor.name = `Ping Monitor ${formatMonitorIndex(index)} (port ${endpoint.port})`;
  monitor.pulse_check.config.host = endpoint.host;
  monitor.metadata.port_hint = endpoint.port;
  return monitor;
}

/**
 * Instantiate one monitor per endpoint: HTTP group, then TCP, then ICMP,
 * each in input order and numbered from 1.
 */
export function synthesizeMonitors(groups: EndpointGroups): MonitorDefinition[] {
  return [
    ...groups.http.map((endpoint, i) => buildHttpMonitor(endpoint, i + 1)),
    ...groups.tcp.map((endpoint, i) => buildTcpMonitor(endpoint, i + 1)),
    ...groups.icmp.map((endpoint, i) => buildIcmpMonitor(endpoint, i + 1)),
  ];
}

/**
 * Parse, allocate, partition and synthesize in one pass
 *
 * @throws EmptyInputError when no endpoint lines are given
 * @throws MalformedEndpointError on the first unparseable line
 */
export function generateMonitorsFromEndpoints(
  lines: readonly string[],
  options: SynthesizerOptions,
): SynthesizerResult {
  if (lines.length === 0) {
    throw new EmptyInputError("No endpoints provided.");
  }

  const records = parseEndpoints(lines, { defaultPorts: options.defaultPorts });
  const plan = computeDistribution(records.length, options.distribution);
  const groups = partitionEndpoints(records, plan);
  const monitors = synthesizeMonitors(groups);

  logger.info("Synthesized monitors from endpoints", {
    endpoints: records.length,
    http: plan.http,
    tcp: plan.tcp,
    icmp: plan.icmp,
  });

  return { monitors, plan };
}
