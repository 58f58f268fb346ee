/**
 * Distribution allocator - splits an endpoint total across monitor types
 */

import type { DistributionPolicy } from "../../types/config.js";
import type { DistributionPlan, EndpointRecord } from "../../types/data-model.js";
import { ConfigError, DistributionMismatchError } from "../../utils/errors.js";

/**
 * Order in which truncation shortfall is handed out
 */
export const BUCKET_ORDER = ["http", "tcp", "icmp"] as const;

export type Bucket = (typeof BUCKET_ORDER)[number];

const FRACTION_TOLERANCE = 1e-9;

export function validateDistributionPolicy(policy: Readonly<DistributionPolicy>): void {
  for (const bucket of BUCKET_ORDER) {
    const fraction = policy[bucket];
    if (!Number.isFinite(fraction) || fraction < 0) {
      throw new ConfigError(
        `Distribution fraction for ${bucket} must be a non-negative number, got ${fraction}`,
        { bucket, fraction },
      );
    }
  }

  const sum = policy.http + policy.tcp + policy.icmp;
  if (Math.abs(sum - 1) > FRACTION_TOLERANCE) {
    throw new ConfigError(`Distribution fractions must sum to 1, got ${sum}`, {
      policy: { ...policy },
    });
  }
}

/**
 * Compute a deterministic split of `total` endpoints.
 *
 * Each bucket gets floor(total × fraction); the remainder goes out one unit
 * at a time cycling http → tcp → icmp, starting at http.
 *
 * @example
 * computeDistribution(7, { http: 0.8, tcp: 0.1, icmp: 0.1 });
 * // { http: 6, tcp: 1, icmp: 0 }
 */
export function computeDistribution(
  total: number,
  policy: Readonly<DistributionPolicy>,
): DistributionPlan {
  if (!Number.isInteger(total) || total < 0) {
    throw new ConfigError(`Distribution total must be a non-negative integer, got ${total}`, {
      total,
    });
  }
  validateDistributionPolicy(policy);

  const plan: DistributionPlan = {
    http: Math.floor(total * policy.http),
    tcp: Math.floor(total * policy.tcp),
    icmp: Math.floor(total * policy.icmp),
  };

  let remainder = total - (plan.http + plan.tcp + plan.icmp);
  let index = 0;
  while (remainder > 0) {
    const bucket = BUCKET_ORDER[index % BUCKET_ORDER.length] ?? "http";
    plan[bucket] += 1;
    remainder -= 1;
    index += 1;
  }

  return plan;
}

/**
 * Slice records into contiguous http/tcp/icmp groups matching the plan
 *
 * @throws DistributionMismatchError if the plan does not consume every record exactly
 */
export function partitionEndpoints(
  records: readonly EndpointRecord[],
  plan: DistributionPlan,
): Record<Bucket, EndpointRecord[]> {
  const groups: Record<Bucket, EndpointRecord[]> = { http: [], tcp: [], icmp: [] };

  let start = 0;
  for (const bucket of BUCKET_ORDER) {
    const end = start + plan[bucket];
    groups[bucket] = records.slice(start, end);
    start = end;
  }

  if (start !== records.length) {
    throw new DistributionMismatchError(
      "Distribution counts do not match endpoint total.",
      { planned: start, endpoints: records.length, plan: { ...plan } },
    );
  }

  return groups;
}
