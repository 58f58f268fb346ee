/**
 * Synthesizer module types
 */

import type { DistributionPolicy } from "../../types/config.js";
import type {
  DistributionPlan,
  EndpointRecord,
  MonitorDefinition,
} from "../../types/data-model.js";

export interface EndpointGroups {
  http: readonly EndpointRecord[];
  tcp: readonly EndpointRecord[];
  icmp: readonly EndpointRecord[];
}

export interface SynthesizerOptions {
  distribution: Readonly<DistributionPolicy>;
  defaultPorts: Readonly<Record<string, number>>;
}

export interface SynthesizerResult {
  monitors: MonitorDefinition[];
  plan: DistributionPlan;
}
