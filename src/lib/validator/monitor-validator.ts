/**
 * Monitor document validation using Ajv
 */

import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import type { ConfigMapping } from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";
import { MONITOR_SCHEMA } from "./monitor-schema.js";
import type {
  MonitorViolation,
  NameUniquenessResult,
  ValidationReport,
  ViolationDetail,
} from "./types.js";

function describeError(error: ErrorObject): ViolationDetail {
  // For missing required properties, Ajv names the field in params
  const missing = error.params["missingProperty"];
  const path =
    error.keyword === "required" && typeof missing === "string"
      ? `${error.instancePath}/${missing}`
      : error.instancePath || "/";

  return {
    path,
    message: `${error.message ?? "invalid"} (keyword: ${error.keyword})`,
  };
}

/**
 * Validates monitor definitions against MONITOR_SCHEMA
 */
export class MonitorValidator {
  private ajv: Ajv;
  private validateFn: ValidateFunction;

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      strict: false,
    });
    this.validateFn = this.ajv.compile(MONITOR_SCHEMA);
  }

  validate(monitor: ConfigMapping): ViolationDetail[] {
    if (this.validateFn(monitor)) {
      return [];
    }
    // if/then failures duplicate the underlying error
    return (this.validateFn.errors ?? [])
      .filter((error) => error.keyword !== "if")
      .map(describeError);
  }

  validateAll(monitors: readonly ConfigMapping[]): MonitorViolation[] {
    const violations: MonitorViolation[] = [];

    monitors.forEach((monitor, index) => {
      const errors = this.validate(monitor);
      if (errors.length > 0) {
        const name = monitor["name"];
        violations.push({
          monitorIndex: index,
          ...(typeof name === "string" ? { name } : {}),
          errors,
        });
      }
    });

    return violations;
  }
}

/**
 * Count string names and report every name used more than once
 */
export function checkNameUniqueness(monitors: readonly ConfigMapping[]): NameUniquenessResult {
  const counts = new Map<string, number>();
  for (const monitor of monitors) {
    const name = monitor["name"];
    if (typeof name === "string") {
      counts.set(name, (counts.get(name) ?? 0) + 1);
    }
  }

  let totalNames = 0;
  for (const count of counts.values()) {
    totalNames += count;
  }
  const duplicates: Record<string, number> = Object.fromEntries(
    [...counts].filter(([, count]) => count > 1),
  );

  return {
    totalNames,
    uniqueNames: counts.size,
    duplicates,
    passed: Object.keys(duplicates).length === 0,
  };
}

export function validateMonitors(monitors: readonly ConfigMapping[]): ValidationReport {
  const violations = new MonitorValidator().validateAll(monitors);
  const nameUniqueness = checkNameUniqueness(monitors);
  const invalidMonitors = violations.length;

  const report: ValidationReport = {
    totalMonitors: monitors.length,
    validMonitors: monitors.length - invalidMonitors,
    invalidMonitors,
    violations,
    nameUniqueness,
    passed: invalidMonitors === 0 && nameUniqueness.passed,
  };

  logger.debug("Validated monitors", {
    total: report.totalMonitors,
    invalid: invalidMonitors,
    duplicateNames: Object.keys(nameUniqueness.duplicates).length,
  });

  return report;
}
