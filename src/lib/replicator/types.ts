/**
 * Replicator module types
 */

import type { ConfigMapping } from "../../types/data-model.js";

export interface ExpansionOptions {
  /** Generated names are `${namePrefix}-${n}` */
  namePrefix?: string;
}

export type ExpansionStatus = "expanded" | "noop";

export interface ExpansionResult {
  status: ExpansionStatus;
  monitors: ConfigMapping[];
  originalCount: number;
  addedCount: number;
  targetCount: number;
}

export interface ReplicationResult {
  monitors: ConfigMapping[];
  originalCount: number;
  factor: number;
}
