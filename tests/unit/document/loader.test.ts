import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  asConfigValue,
  asMonitorDocument,
  loadDocument,
  loadMonitorDocument,
  parseDocument,
} from '../../../src/lib/document/index.js';
import { EmptyInputError, StorageError } from '../../../src/utils/errors.js';

describe('parseDocument', () => {
  it('should parse YAML and JSON text alike', () => {
    expect(parseDocument('monitors:\n  - name: a\n', 'inline')).toEqual({
      monitors: [{ name: 'a' }],
    });
    expect(parseDocument('{"monitors": [{"name": "a"}]}', 'inline')).toEqual({
      monitors: [{ name: 'a' }],
    });
  });

  it('should map an empty document to null', () => {
    expect(parseDocument('', 'inline')).toBeNull();
  });

  it('should keep key order', () => {
    const parsed = parseDocument('zeta: 1\nalpha: 2\nmid: 3\n', 'inline');
    expect(Object.keys(asMonitorLike(parsed))).toEqual(['zeta', 'alpha', 'mid']);
  });

  it('should keep a "__proto__" key and its contents', () => {
    const parsed = parseDocument('a: 1\n__proto__:\n  url: http://x\n', 'inline');
    expect(Object.entries(asMonitorLike(parsed))).toEqual([
      ['a', 1],
      ['__proto__', { url: 'http://x' }],
    ]);
  });

  it('should raise StorageError on invalid syntax', () => {
    expect(() => parseDocument('monitors: [unclosed', 'broken.yaml')).toThrow(StorageError);
  });
});

function asMonitorLike(value: unknown): object {
  if (typeof value !== 'object' || value === null) {
    throw new Error('expected a mapping');
  }
  return value;
}

describe('asConfigValue', () => {
  it('should reject values with no place in a config tree', () => {
    expect(() => asConfigValue({ a: [1, Number.POSITIVE_INFINITY] })).toThrow(
      'Unsupported value at $.a[1]',
    );
    expect(() => asConfigValue(new Date(0))).toThrow(StorageError);
  });
});

describe('asMonitorDocument', () => {
  it('should keep other top-level keys', () => {
    const document = asMonitorDocument({ version: 2, monitors: [{ name: 'a' }] }, 'doc');
    expect(document).toEqual({ version: 2, monitors: [{ name: 'a' }] });
  });

  it('should reject documents without a monitors list', () => {
    expect(() => asMonitorDocument(['a'], 'doc')).toThrow('Document root must be a mapping: doc');
    expect(() => asMonitorDocument({ monitors: 'a' }, 'doc')).toThrow(
      "'monitors' key not found or is not a list in doc",
    );
    expect(() => asMonitorDocument({ monitors: ['a'] }, 'doc')).toThrow(
      'Monitor at index 0 is not a mapping in doc',
    );
  });

  it('should reject an empty monitors list', () => {
    expect(() => asMonitorDocument({ monitors: [] }, 'doc')).toThrow(EmptyInputError);
  });
});

describe('loadDocument', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'monfix-doc-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load a monitor document from disk', async () => {
    const path = join(dir, 'seed.yaml');
    await writeFile(path, 'monitors:\n  - name: api\n    pulse_check: { type: http }\n');
    const document = await loadMonitorDocument(path);
    expect(document.monitors).toEqual([{ name: 'api', pulse_check: { type: 'http' } }]);
  });

  it('should raise StorageError for a missing file', async () => {
    await expect(loadDocument(join(dir, 'absent.yaml'))).rejects.toThrow(
      `Failed to read document: ${join(dir, 'absent.yaml')}`,
    );
  });
});
