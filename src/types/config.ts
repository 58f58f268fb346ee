/**
 * Engine configuration types
 */

/**
 * Target fractions for each monitor type; must sum to 1
 */
export interface DistributionPolicy {
  http: number;
  tcp: number;
  icmp: number;
}

export interface EngineConfig {
  distribution: Readonly<DistributionPolicy>;
  /** Port implied by a scheme when the endpoint omits one */
  defaultPorts: Readonly<Record<string, number>>;
  /** Keys whose string values the substitution walker rewrites */
  identifierKeys: readonly string[];
  fetchTimeoutMs: number;
  expansionNamePrefix: string;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  distribution: Object.freeze({ http: 0.8, tcp: 0.1, icmp: 0.1 }),
  defaultPorts: Object.freeze({ http: 80, https: 443 }),
  identifierKeys: Object.freeze(["url", "host"]),
  fetchTimeoutMs: 30_000,
  expansionNamePrefix: "Monitor",
});
