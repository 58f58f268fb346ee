/**
 * Validator module types
 */

export interface ViolationDetail {
  path: string;
  message: string;
}

export interface MonitorViolation {
  monitorIndex: number;
  name?: string;
  errors: ViolationDetail[];
}

export interface NameUniquenessResult {
  totalNames: number;
  uniqueNames: number;
  /** Names that appear more than once, with their occurrence count */
  duplicates: Record<string, number>;
  passed: boolean;
}

export interface ValidationReport {
  totalMonitors: number;
  validMonitors: number;
  invalidMonitors: number;
  violations: MonitorViolation[];
  nameUniqueness: NameUniquenessResult;
  passed: boolean;
}
