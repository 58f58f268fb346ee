/**
 * Core data model for monitor configuration documents
 */

/**
 * A scalar leaf in a parsed configuration document
 */
export type ConfigScalar = string | number | boolean | null;

/**
 * Any value a YAML/JSON configuration document can hold
 */
export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigMapping;

export type ConfigMapping = { [key: string]: ConfigValue };

export type PulseType = "http" | "tcp" | "icmp";

export type Severity = "red" | "yellow";

/**
 * Notification directive attached to a severity code
 */
export type CodeDirective = {
  dispatch: boolean;
  notify: string;
  config: { [key: string]: string };
};

export type MonitorCodes = {
  red: CodeDirective;
  yellow: CodeDirective;
};

export type HttpPulseConfig = {
  retries: number;
  method: string;
  url: string;
};

export type TcpPulseConfig = {
  retries: number;
  host: string;
  port: number;
};

export type IcmpPulseConfig = {
  retries: number;
  host: string;
};

export type PulseCheck<T extends PulseType, C> = {
  type: T;
  interval: string;
  timeout: string;
  max_failures: number;
  config: C;
};

export type HttpMonitor = {
  name: string;
  pulse_check: PulseCheck<"http", HttpPulseConfig>;
  codes: MonitorCodes;
};

export type TcpMonitor = {
  name: string;
  pulse_check: PulseCheck<"tcp", TcpPulseConfig>;
  codes: MonitorCodes;
};

/**
 * ICMP has no port; the endpoint's port is carried as a diagnostic hint
 */
export type IcmpMonitor = {
  name: string;
  pulse_check: PulseCheck<"icmp", IcmpPulseConfig>;
  codes: MonitorCodes;
  metadata: { port_hint: number };
};

export type MonitorDefinition = HttpMonitor | TcpMonitor | IcmpMonitor;

/**
 * Root of a monitor fixture. Other top-level keys are carried through untouched.
 */
export type MonitorDocument = ConfigMapping & { monitors: ConfigMapping[] };

/**
 * Parsed endpoint. Frozen once created.
 */
export interface EndpointRecord {
  readonly scheme: string;
  readonly host: string;
  readonly port: number;
  readonly path: string;
  readonly raw: string;
}

/**
 * Number of endpoints routed to each monitor type
 */
export interface DistributionPlan {
  http: number;
  tcp: number;
  icmp: number;
}

export function isConfigMapping(value: unknown): value is ConfigMapping {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
