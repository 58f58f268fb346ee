/**
 * Distribution allocator tests
 */

import { describe, it, expect } from 'vitest';
import {
  computeDistribution,
  partitionEndpoints,
  validateDistributionPolicy,
} from '../../src/lib/allocator/index.js';
import { parseEndpoints } from '../../src/lib/endpoints/parser.js';
import { ConfigError, DistributionMismatchError } from '../../src/utils/errors.js';

const policy = { http: 0.8, tcp: 0.1, icmp: 0.1 };

describe('Distribution Allocator', () => {
  it('should split 10 endpoints 8/1/1', () => {
    expect(computeDistribution(10, policy)).toEqual({ http: 8, tcp: 1, icmp: 1 });
  });

  it('should hand the remainder out starting at http', () => {
    // floors are 5/0/0, shortfall of 2 goes to http then tcp
    expect(computeDistribution(7, policy)).toEqual({ http: 6, tcp: 1, icmp: 0 });
    // floors are 0/0/0, shortfall of 1 goes to http
    expect(computeDistribution(1, policy)).toEqual({ http: 1, tcp: 0, icmp: 0 });
    // floors are 1/0/0, shortfall of 1 goes to http
    expect(computeDistribution(2, policy)).toEqual({ http: 2, tcp: 0, icmp: 0 });
    // floors are 3/0/0, shortfall of 1 goes to http
    expect(computeDistribution(4, policy)).toEqual({ http: 4, tcp: 0, icmp: 0 });
  });

  it('should allocate nothing for zero endpoints', () => {
    expect(computeDistribution(0, policy)).toEqual({ http: 0, tcp: 0, icmp: 0 });
  });

  it('should sum to N and stay within 1 of each floor for N up to 500', () => {
    for (let n = 0; n <= 500; n++) {
      const plan = computeDistribution(n, policy);
      expect(plan.http + plan.tcp + plan.icmp).toBe(n);
      for (const bucket of ['http', 'tcp', 'icmp'] as const) {
        const floor = Math.floor(n * policy[bucket]);
        expect(plan[bucket]).toBeGreaterThanOrEqual(floor);
        expect(plan[bucket] - floor).toBeLessThanOrEqual(1);
      }
    }
  });

  it('should honour a custom policy', () => {
    expect(computeDistribution(10, { http: 0.5, tcp: 0.25, icmp: 0.25 })).toEqual({
      http: 6,
      tcp: 2,
      icmp: 2,
    });
  });

  it('should reject invalid totals', () => {
    expect(() => computeDistribution(-1, policy)).toThrow(ConfigError);
    expect(() => computeDistribution(2.5, policy)).toThrow(ConfigError);
  });

  it('should reject policies that do not sum to 1', () => {
    expect(() => validateDistributionPolicy({ http: 0.8, tcp: 0.1, icmp: 0.2 })).toThrow(
      ConfigError,
    );
    expect(() => validateDistributionPolicy({ http: 1.1, tcp: -0.1, icmp: 0 })).toThrow(
      'Distribution fraction for tcp must be a non-negative number, got -0.1',
    );
  });

  describe('partitionEndpoints', () => {
    const records = parseEndpoints(
      ['http://a', 'http://b', 'http://c', 'tcp://d:1', 'tcp://e:2'],
      { defaultPorts: { http: 80 } },
    );

    it('should slice contiguous groups in http, tcp, icmp order', () => {
      const groups = partitionEndpoints(records, { http: 3, tcp: 1, icmp: 1 });
      expect(groups.http.map((r) => r.host)).toEqual(['a', 'b', 'c']);
      expect(groups.tcp.map((r) => r.host)).toEqual(['d']);
      expect(groups.icmp.map((r) => r.host)).toEqual(['e']);
    });

    it('should fail when the plan does not cover every endpoint', () => {
      expect(() => partitionEndpoints(records, { http: 3, tcp: 1, icmp: 0 })).toThrow(
        DistributionMismatchError,
      );
      expect(() => partitionEndpoints(records, { http: 8, tcp: 1, icmp: 1 })).toThrow(
        'Distribution counts do not match endpoint total.',
      );
    });
  });
});
