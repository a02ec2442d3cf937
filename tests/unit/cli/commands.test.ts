/**
 * Tests for the import and overview CLI commands.
 *
 * Commands run through program.parseAsync() against a throwaway config and
 * database under the OS temp directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Command } from 'commander';
import { registerImportCommand } from '../../../src/cli/commands/import.js';
import { registerOverviewCommand } from '../../../src/cli/commands/overview.js';
import { describeCliError } from '../../../src/cli/context.js';
import { NotFoundError, ValidationError } from '../../../src/domain/errors.js';

function buildProgram(): Command {
  const program = new Command();
  program.exitOverride();
  registerImportCommand(program);
  registerOverviewCommand(program);
  return program;
}

describe('CLI commands', () => {
  let dir: string;
  let configPath: string;
  let csvPath: string;
  let stdout: string[];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'crm-cli-'));
    configPath = path.join(dir, 'config.json');
    csvPath = path.join(dir, 'customers.csv');
    fs.writeFileSync(configPath, JSON.stringify({ paths: { base_dir: dir }, database: { file: 'crm.db' } }));
    fs.writeFileSync(csvPath, 'name,email\nAda,ada@example.com\nBob,bob@example.com\n,nameless@example.com\n');

    stdout = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      stdout.push(`${args.map(String).join(' ')}\n`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<void> {
    await buildProgram().parseAsync(['node', 'crm', ...args]);
  }

  it('prints a dry-run report without writing customers', async () => {
    await run('import', csvPath, '--dry-run', '-c', configPath);
    const report = JSON.parse(stdout.join(''));
    expect(report).toMatchObject({ total: 3, valid: 2, invalid: 1 });

    stdout = [];
    await run('overview', '--json', '-c', configPath);
    expect(JSON.parse(stdout.join('')).total_customers).toBe(0);
  });

  it('commits the file and writes the report where asked', async () => {
    const reportPath = path.join(dir, 'report.csv');
    await run('import', csvPath, '--report', reportPath, '-c', configPath);

    expect(stdout[0]).toContain('"created": 2');
    expect(fs.readFileSync(reportPath, 'utf-8').trimEnd().split('\n')).toEqual([
      'name,email,status,message',
      'Ada,ada@example.com,created,',
      'Bob,bob@example.com,created,',
      ',nameless@example.com,failed,name: Required',
    ]);

    stdout = [];
    await run('overview', '--json', '-c', configPath);
    expect(JSON.parse(stdout.join(''))).toMatchObject({ total_customers: 2, lead_count: 2 });
  });

  it('exits with an error for an unknown mode', async () => {
    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
      errors.push(String(message));
    });
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await expect(run('import', csvPath, '--mode', 'replace', '-c', configPath)).rejects.toThrow('process.exit');
    expect(exit).toHaveBeenCalledWith(1);
    expect(errors[0]).toMatch(/^Error: Invalid import options\n {2}mode: /);
  });
});

describe('describeCliError', () => {
  it('lists validation issues under the message', () => {
    const error = new ValidationError('Invalid customer', [{ path: 'email', message: 'Invalid email format' }]);
    expect(describeCliError(error)).toBe('Invalid customer\n  email: Invalid email format');
  });

  it('appends the code for other domain errors', () => {
    expect(describeCliError(new NotFoundError('Customer', 'c1'))).toBe('Customer not found: c1 (NOT_FOUND)');
  });
});
