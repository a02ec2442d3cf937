import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_CONFIG, getDatabasePath, loadConfig } from '../../../src/config/config.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'crm-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns the defaults when the file does not exist', () => {
    const result = loadConfig(path.join(dir, 'missing.json'));
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.pagination).toEqual(DEFAULT_CONFIG.pagination);
      expect(result.data.import.natural_key).toBe('email');
    }
  });

  it('merges nested sections over the defaults', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ import: { natural_key: 'phone' }, api: { port: 9001 } }));

    const result = loadConfig(file);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.import).toEqual({ ...DEFAULT_CONFIG.import, natural_key: 'phone' });
      expect(result.data.api.port).toBe(9001);
      expect(result.data.api.host).toBe('127.0.0.1');
    }
  });

  it('lets LOG_LEVEL override the file', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ logging: { level: 'debug' } }));

    const result = loadConfig(file);
    expect(result.success && result.data.logging.level).toBe(process.env.LOG_LEVEL);
  });

  it('rejects values outside the schema', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ import: { natural_key: 'name' } }));

    expect(loadConfig(file).success).toBe(false);
  });

  it('rejects a file that is not a JSON object', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, '[1, 2]');

    const result = loadConfig(file);
    expect(result.success).toBe(false);
  });
});

describe('getDatabasePath', () => {
  it('keeps in-memory and absolute paths as given', () => {
    expect(getDatabasePath({ database: { file: ':memory:' } })).toBe(':memory:');
    expect(getDatabasePath({ database: { file: '/var/lib/crm/crm.db' } })).toBe('/var/lib/crm/crm.db');
  });

  it('places relative files under the base directory', () => {
    expect(getDatabasePath({ database: { file: 'data.db' }, paths: { base_dir: '/srv/crm', config_file: 'config.json' } })).toBe(
      '/srv/crm/data.db'
    );
  });
});
