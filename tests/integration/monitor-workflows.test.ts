/**
 * Command workflows end to end: endpoint list -> monitors -> expanded,
 * replicated and substituted documents, all on real files.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { parse } from 'yaml';
import { runGenerate } from '../../src/cli/commands/generate.js';
import { runExpand } from '../../src/cli/commands/expand.js';
import { runReplicate } from '../../src/cli/commands/replicate.js';
import { runSubstitute } from '../../src/cli/commands/substitute.js';
import { runValidate } from '../../src/cli/commands/validate.js';
import {
  ConfigError,
  EmptyInputError,
  InvalidReplicationFactorError,
  MalformedEndpointError,
  NoReplacementsAvailableError,
} from '../../src/utils/errors.js';

const fixture = (name: string): string =>
  fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf-8'));
}

describe('Monitor workflows', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'monfix-workflow-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('generate', () => {
    it('should build 8 HTTP, 1 TCP and 1 ICMP monitor from ten endpoints', async () => {
      const output = join(dir, 'monitors.yaml');
      const { result } = await runGenerate(fixture('endpoints.txt'), output, {});

      expect(result.status).toBe('success');
      expect(result.summary).toEqual({
        endpoints: 10,
        monitors: 10,
        distribution: { http: 8, tcp: 1, icmp: 1 },
      });

      const document = parse(await readFile(output, 'utf-8'));
      expect(document.monitors).toHaveLength(10);
      expect(document.monitors[0]).toMatchObject({
        name: 'HTTP Monitor 00001 (port 80)',
        pulse_check: { type: 'http', config: { url: 'http://api.example.test/health' } },
      });
      expect(document.monitors[1].name).toBe('HTTP Monitor 00002 (port 443)');
      expect(document.monitors[8]).toMatchObject({
        name: 'TCP Monitor 00001 (port 5432)',
        pulse_check: { type: 'tcp', config: { host: 'db.example.test', port: 5432 } },
      });
      expect(document.monitors[9]).toMatchObject({
        name: 'Ping Monitor 00001 (port 80)',
        pulse_check: { type: 'icmp', config: { host: 'gateway.example.test' } },
        metadata: { port_hint: 80 },
      });
    });

    it('should produce a document that passes validation', async () => {
      const output = join(dir, 'monitors.json');
      await runGenerate(fixture('endpoints.txt'), output, {});

      const { result } = await runValidate(output, {});
      expect(result.summary).toEqual({ totalMonitors: 10, uniqueNames: 10 });
    });

    it('should write nothing when an endpoint is malformed', async () => {
      const endpoints = join(dir, 'endpoints.txt');
      const output = join(dir, 'monitors.yaml');
      await writeFile(endpoints, 'http://ok.test\nnot-an-endpoint\n');

      await expect(runGenerate(endpoints, output, {})).rejects.toThrow(MalformedEndpointError);
      expect(existsSync(output)).toBe(false);
    });

    it('should reject an empty endpoint list', async () => {
      const endpoints = join(dir, 'empty.txt');
      await writeFile(endpoints, '\n\n');
      await expect(runGenerate(endpoints, join(dir, 'out.yaml'), {})).rejects.toThrow(
        EmptyInputError,
      );
    });
  });

  describe('expand', () => {
    it('should append renamed copies and keep other top-level keys', async () => {
      const output = join(dir, 'expanded.json');
      const { result } = await runExpand(fixture('seed-monitors.yaml'), output, { count: 5 });

      expect(result.status).toBe('success');
      expect(result.summary).toEqual({
        originalMonitors: 2,
        addedMonitors: 3,
        totalMonitors: 5,
        targetCount: 5,
      });

      const document = await readJson(output);
      expect(document).toMatchObject({ version: 1 });
      expect(document).toHaveProperty('monitors');
      const names = parse(await readFile(output, 'utf-8')).monitors.map(
        (monitor: { name: string }) => monitor.name,
      );
      expect(names).toEqual(['Checkout API', 'Orders DB', 'Monitor-3', 'Monitor-4', 'Monitor-5']);
    });

    it('should take the count from a config file', async () => {
      const config = join(dir, 'config.yaml');
      await writeFile(config, 'engine:\n  expansionNamePrefix: Load\nexpand:\n  count: 3\n');
      const output = join(dir, 'expanded.yaml');

      await runExpand(fixture('seed-monitors.yaml'), output, { config });

      const document = parse(await readFile(output, 'utf-8'));
      expect(document.monitors[2]).toMatchObject({
        name: 'Load-3',
        pulse_check: { type: 'http' },
      });
    });

    it('should write an unchanged copy when the target is already met', async () => {
      const output = join(dir, 'same.yaml');
      const { result } = await runExpand(fixture('seed-monitors.yaml'), output, { count: 1 });

      expect(result.status).toBe('noop');
      expect(parse(await readFile(output, 'utf-8'))).toEqual(
        parse(await readFile(fixture('seed-monitors.yaml'), 'utf-8')),
      );
    });

    it('should require a count', async () => {
      await expect(runExpand(fixture('seed-monitors.yaml'), join(dir, 'x.yaml'), {})).rejects.toThrow(
        ConfigError,
      );
    });
  });

  describe('replicate', () => {
    it('should write only the copies, pass by pass', async () => {
      const output = join(dir, 'replicated.yaml');
      const { result } = await runReplicate(fixture('seed-monitors.yaml'), output, { factor: 2 });

      expect(result.summary).toEqual({ originalMonitors: 2, factor: 2, totalMonitors: 4 });

      const document = parse(await readFile(output, 'utf-8'));
      expect(Object.keys(document)).toEqual(['monitors']);
      expect(document.monitors.map((monitor: { name: string }) => monitor.name)).toEqual([
        'Checkout API - Copy 1',
        'Orders DB - Copy 1',
        'Checkout API - Copy 2',
        'Orders DB - Copy 2',
      ]);
    });

    it('should reject a non-positive factor before reading the input', async () => {
      await expect(
        runReplicate(join(dir, 'absent.yaml'), join(dir, 'out.yaml'), { factor: 0 }),
      ).rejects.toThrow(InvalidReplicationFactorError);
    });
  });

  describe('substitute', () => {
    it('should replace every url and host consistently', async () => {
      const output = join(dir, 'substituted.yaml');
      const { result } = await runSubstitute(fixture('seed-monitors.yaml'), output, {
        endpointsFile: fixture('replacements.txt'),
      });

      expect(result.status).toBe('success');
      expect(result.summary).toEqual({
        occurrences: 3,
        distinctIdentifiers: 3,
        replacementsAvailable: 2,
        identifierKeys: ['url', 'host'],
      });

      const document = parse(await readFile(output, 'utf-8'));
      expect(document.version).toBe(1);
      expect(document.monitors[0].pulse_check.config.url).toBe('https://replacement-a.test/ping');
      expect(document.monitors[0].codes.red.config.url).toBe('replacement-b.test');
      expect(document.monitors[1].pulse_check.config.host).toBe(
        'https://replacement-a.test/ping',
      );
      expect(document.monitors[1].pulse_check.config.port).toBe(5432);
    });

    it('should limit replacement to the given keys', async () => {
      const output = join(dir, 'hosts-only.json');
      const { result } = await runSubstitute(fixture('seed-monitors.yaml'), output, {
        endpointsFile: fixture('replacements.txt'),
        keys: 'host',
      });

      expect(result.summary).toMatchObject({ occurrences: 1, distinctIdentifiers: 1 });
      const document = parse(await readFile(output, 'utf-8'));
      expect(document.monitors[0].pulse_check.config.url).toBe(
        'http://checkout.internal.test/health',
      );
      expect(document.monitors[1].pulse_check.config.host).toBe(
        'https://replacement-a.test/ping',
      );
    });

    it('should copy a document without identifiers unchanged', async () => {
      const input = join(dir, 'plain.yaml');
      const output = join(dir, 'plain-out.yaml');
      await writeFile(input, 'settings:\n  retries: 2\n');

      const { result } = await runSubstitute(input, output, {
        endpointsFile: fixture('replacements.txt'),
      });

      expect(result.status).toBe('unchanged');
      expect(await readFile(output, 'utf-8')).toBe('settings:\n  retries: 2\n');
    });

    it('should fail when the replacement list is empty', async () => {
      const replacements = join(dir, 'none.txt');
      await writeFile(replacements, '\n');

      await expect(
        runSubstitute(fixture('seed-monitors.yaml'), join(dir, 'out.yaml'), {
          endpointsFile: replacements,
        }),
      ).rejects.toThrow(NoReplacementsAvailableError);
    });

    it('should require exactly one endpoint source', async () => {
      const output = join(dir, 'out.yaml');
      await expect(runSubstitute(fixture('seed-monitors.yaml'), output, {})).rejects.toThrow(
        'One of --endpoints-file or --endpoints-url is required',
      );
      await expect(
        runSubstitute(fixture('seed-monitors.yaml'), output, {
          endpointsFile: 'a.txt',
          endpointsUrl: 'http://lists.test/hosts',
        }),
      ).rejects.toThrow('--endpoints-file and --endpoints-url are mutually exclusive');
    });
  });

  describe('validate', () => {
    it('should fail on duplicate names and write the report', async () => {
      const output = join(dir, 'replicated.yaml');
      const reportPath = join(dir, 'report.json');
      await runExpand(fixture('seed-monitors.yaml'), output, { count: 3 });
      const document = parse(await readFile(output, 'utf-8'));
      document.monitors[2].name = 'Checkout API';
      await writeFile(output, JSON.stringify(document));

      await expect(runValidate(output, { reportPath })).rejects.toThrow(
        `0 invalid monitors, 1 duplicated names in ${output}`,
      );
      expect(await readJson(reportPath)).toMatchObject({
        totalMonitors: 3,
        validMonitors: 3,
        invalidMonitors: 0,
        nameUniqueness: { duplicates: { 'Checkout API': 2 }, passed: false },
        passed: false,
      });
    });
  });
});
