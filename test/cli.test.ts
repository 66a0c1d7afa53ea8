/**
 * Tests for the command-line interface
 */

import * as fs from 'fs';
import * as path from 'path';
import { createProgram, readDocumentInput } from '../src/cli';

const TEST_STORE = path.join(__dirname, '.scratch-cli');
const V1 = path.join(__dirname, 'fixtures', 'schema-v1.json');
const V2 = path.join(__dirname, 'fixtures', 'schema-v2.json');

let log: jest.SpyInstance;
let error: jest.SpyInstance;

function run(...args: string[]): Promise<unknown> {
  return createProgram().parseAsync(['node', 'schema-evolution', ...args]);
}

function stdout(): string {
  return log.mock.calls.map((call: unknown[]) => call.join(' ')).join('\n');
}

beforeEach(() => {
  if (fs.existsSync(TEST_STORE)) {
    fs.rmSync(TEST_STORE, { recursive: true, force: true });
  }
  log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  process.exitCode = undefined;
});

afterEach(() => {
  log.mockRestore();
  error.mockRestore();
  process.exitCode = undefined;
});

afterAll(() => {
  if (fs.existsSync(TEST_STORE)) {
    fs.rmSync(TEST_STORE, { recursive: true, force: true });
  }
});

describe('CLI', () => {
  test('readDocumentInput reads files and passes inline JSON through', () => {
    expect(readDocumentInput(V1)).toBe(fs.readFileSync(V1, 'utf-8'));
    expect(readDocumentInput('{"__schema": {}}')).toBe('{"__schema": {}}');
  });

  // ─── sdl ──────────────────────────────────────────────────────────────

  describe('sdl', () => {
    test('prints the schema without built-in scalars', async () => {
      await run('sdl', '-d', V1);

      expect(log).toHaveBeenCalledWith(
        'type Query {\n  user(id: ID!): User\n}\n\ntype User {\n  id: ID!\n  name: String\n  age: Int\n}\n'
      );
      expect(process.exitCode).toBeUndefined();
    });

    test('prints one type', async () => {
      await run('sdl', '-d', V2, '-t', 'User');

      expect(log).toHaveBeenCalledWith('type User {\n  id: ID!\n  age: String\n  email: String\n}\n');
    });

    test('reports invalid input and sets the exit code', async () => {
      await run('sdl', '-d', 'type Query { ping: String }');

      expect(error.mock.calls[0][0]).toMatch(/^❌ Error: Invalid introspection document: not valid JSON/);
      expect(error.mock.calls[1][0]).toBe(
        '   Provide the JSON result of a standard introspection query.'
      );
      expect(process.exitCode).toBe(1);
    });
  });

  // ─── snapshot / check ─────────────────────────────────────────────────

  describe('snapshot and check', () => {
    test('snapshot stores the first version', async () => {
      await run('snapshot', '-k', 'storefront-api', '-d', V1, '-s', TEST_STORE);

      expect(log).toHaveBeenCalledWith('✅ Schema snapshot saved');
      expect(log).toHaveBeenCalledWith('   Version: v1');
      expect(log).toHaveBeenCalledWith('   Types:   6');
    });

    test('check fails on critical changes by default', async () => {
      await run('snapshot', '-k', 'storefront-api', '-d', V1, '-s', TEST_STORE);
      log.mockClear();

      await run('check', '-k', 'storefront-api', '-d', V2, '-s', TEST_STORE, '-f', 'json');

      const report = JSON.parse(stdout());
      expect(report.changes.map((c: { description: string }) => c.description)).toEqual([
        "Field 'name' was removed from type 'User'",
        "Field 'age' type changed from 'Int' to 'String' in type 'User'",
        "Field 'email' was added to type 'User'",
      ]);
      expect(report.summary.breaking).toBe(2);
      expect(process.exitCode).toBe(1);
    });

    test('check passes when the schema is unchanged', async () => {
      await run('snapshot', '-k', 'storefront-api', '-d', V1, '-s', TEST_STORE);
      await run('check', '-k', 'storefront-api', '-d', V1, '-s', TEST_STORE, '--fail-on', 'minor');

      expect(stdout()).toContain('No schema changes detected');
      expect(process.exitCode).toBeUndefined();
    });

    test('check rejects an unknown --fail-on severity', async () => {
      await run('check', '-k', 'storefront-api', '-d', V1, '-s', TEST_STORE, '--fail-on', 'loud');

      expect(error.mock.calls[0][0]).toBe(
        '❌ Error: Severity must be one of: minor, major, critical.'
      );
      expect(process.exitCode).toBe(1);
    });

    test('history lists stored versions', async () => {
      await run('snapshot', '-k', 'storefront-api', '-d', V1, '-s', TEST_STORE);
      await run('snapshot', '-k', 'storefront-api', '-d', V2, '-s', TEST_STORE);
      log.mockClear();

      await run('history', '-k', 'storefront-api', '-s', TEST_STORE);

      expect(log).toHaveBeenCalledWith('📜 Version history for "storefront-api":\n');
      expect(log).toHaveBeenCalledTimes(3);
    });

    test('list shows every stored key', async () => {
      await run('snapshot', '-k', 'storefront-api', '-d', V1, '-s', TEST_STORE);
      log.mockClear();

      await run('list', '-s', TEST_STORE);

      expect(log).toHaveBeenCalledWith('📋 Stored schemas (1):\n');
      expect(log).toHaveBeenCalledWith('  • storefront-api');
    });
  });

  // ─── diff / track ─────────────────────────────────────────────────────

  describe('diff and track', () => {
    test('diff compares two files', async () => {
      await run('diff', '--before', V1, '--after', V2, '-f', 'markdown');

      const lines = stdout().split('\n');
      expect(lines[0]).toBe('# Schema Evolution Analysis: (direct comparison)');
      expect(lines).toContain('- **Breaking Changes:** 2');
      expect(lines).toContain('## Compatibility Score: 33%');
    });

    test('diff compares stored versions', async () => {
      await run('snapshot', '-k', 'storefront-api', '-d', V1, '-s', TEST_STORE);
      await run('snapshot', '-k', 'storefront-api', '-d', V2, '-s', TEST_STORE);
      log.mockClear();

      await run('diff', '-k', 'storefront-api', '--v1', '1', '--v2', '2', '-s', TEST_STORE, '-f', 'json');

      const report = JSON.parse(stdout());
      expect(report.previousVersion).toBe(1);
      expect(report.currentVersion).toBe(2);
      expect(report.changes).toHaveLength(3);
    });

    test('diff without inputs is an error', async () => {
      await run('diff');

      expect(error.mock.calls[0][0]).toBe(
        '❌ Error: Provide either --before/--after or --key with --v1/--v2'
      );
      expect(process.exitCode).toBe(1);
    });

    test('track follows a list of files', async () => {
      await run('track', '--files', V1, V2, V1, '-f', 'json');

      const track = JSON.parse(stdout());
      expect(track.versions).toEqual([1, 2, 3]);
      expect(track.metrics).toHaveLength(2);
      expect(track.summary.transitions).toBe(2);
    });

    test('--min-severity filters the report', async () => {
      await run('diff', '--before', V1, '--after', V2, '--min-severity', 'critical', '-f', 'json');

      expect(JSON.parse(stdout()).summary.total).toBe(2);
    });

    test('an invalid --format is a configuration error', async () => {
      await run('diff', '--before', V1, '--after', V2, '-f', 'html');

      expect(error.mock.calls[0][0]).toMatch(/^❌ Error: Invalid configuration in command line: format: /);
      expect(process.exitCode).toBe(1);
    });
  });
});
