#!/usr/bin/env node

/**
 * graphql-schema-evolution CLI
 *
 * Commands:
 *   snapshot  - Store an introspection result as a new schema version
 *   check     - Check an introspection result against the stored snapshot
 *   diff      - Compare two introspection files or two stored versions
 *   sdl       - Render an introspection result as SDL
 *   track     - Compatibility metrics across versions
 *   list      - List all stored schema keys
 *   history   - Show version history for a key
 */

import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'fs';
import { SchemaEvolution } from './evolution';
import { Config, configSchema, loadConfig } from './config';
import { ConfigError, SchemaEvolutionError, describeError } from './core/errors';
import { severityRank } from './core/differ';
import { ChangeSeverity, EvolutionReport } from './core/types';
import { createLogger } from './logger';

// ─── Option Shapes ──────────────────────────────────────────────────────────

type GlobalFlags = {
  config?: string;
};

interface CommonFlags {
  store?: string;
  minSeverity?: string;
  policy?: string;
  format?: string;
  output?: string;
}

interface SnapshotFlags extends CommonFlags {
  key: string;
  data: string;
  setVersion?: number;
}

interface CheckFlags extends CommonFlags {
  key: string;
  data: string;
  failOn: string;
}

interface DiffFlags extends CommonFlags {
  key?: string;
  before?: string;
  after?: string;
  v1?: number;
  v2?: number;
}

interface SdlFlags extends CommonFlags {
  data: string;
  type?: string;
  deep?: boolean;
  descriptions?: boolean;
  deprecations?: boolean;
}

interface TrackFlags extends CommonFlags {
  key?: string;
  files?: string[];
}

interface HistoryFlags extends CommonFlags {
  key: string;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

const SEVERITIES: readonly ChangeSeverity[] = ['minor', 'major', 'critical'];

function parseVersion(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Version must be a positive integer.');
  }
  return parsed;
}

function parseSeverity(value: string): ChangeSeverity {
  const severity = SEVERITIES.find((s) => s === value);
  if (!severity) {
    throw new InvalidArgumentError(`Severity must be one of: ${SEVERITIES.join(', ')}.`);
  }
  return severity;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-s, --store <dir>', 'Schema store directory (default: ./schemas)')
    .option('--min-severity <severity>', 'Minimum severity to report: minor, major, critical')
    .option('--policy <policy>', 'Type change policy: base-name, structural')
    .option('-f, --format <format>', 'Output format: console, json, markdown')
    .option('-o, --output <file>', 'Write output to file instead of stdout');
}

function resolveSettings(program: Command, flags: CommonFlags): Config {
  const config = loadConfig({ file: program.opts<GlobalFlags>().config });
  const overrides = Object.fromEntries(
    Object.entries({
      store: flags.store,
      minSeverity: flags.minSeverity,
      typeChangePolicy: flags.policy,
      format: flags.format,
    }).filter(([, value]) => value !== undefined)
  );

  const result = configSchema.safeParse({ ...config, ...overrides });
  if (!result.success) {
    throw new ConfigError(
      'command line',
      result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    );
  }
  return result.data;
}

function createEvolution(config: Config): SchemaEvolution {
  return new SchemaEvolution({
    store: config.store,
    minSeverity: config.minSeverity,
    typeChangePolicy: config.typeChangePolicy,
    customScalars: config.customScalars,
    logger: createLogger(config.logLevel),
  });
}

/**
 * Introspection input is either a path to a JSON file or inline JSON text.
 */
export function readDocumentInput(fileOrData: string): string {
  if (fs.existsSync(fileOrData)) {
    return fs.readFileSync(fileOrData, 'utf-8');
  }
  return fileOrData;
}

function emit(text: string, outputFile?: string): void {
  if (outputFile) {
    fs.writeFileSync(outputFile, text, 'utf-8');
    console.log(`📄 Output written to ${outputFile}`);
  } else {
    console.log(text);
  }
}

function reportError(error: unknown): void {
  console.error(`❌ Error: ${describeError(error)}`);
  if (error instanceof SchemaEvolutionError && error.suggestedAction) {
    console.error(`   ${error.suggestedAction}`);
  }
}

/**
 * Wrap a command action so that failures print a message and set exit code 1.
 */
function run<T>(action: (flags: T) => Promise<void>): (flags: T) => Promise<void> {
  return async (flags: T) => {
    try {
      await action(flags);
    } catch (error) {
      reportError(error);
      process.exitCode = 1;
    }
  };
}

// ─── Program ────────────────────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command();

  program
    .name('schema-evolution')
    .description('Track GraphQL schema changes and how they affect existing clients.')
    .version('1.0.0')
    .option('-c, --config <file>', 'Config file (default: ./.schema-evolution.json)');

  // ─── snapshot Command ─────────────────────────────────────────────────

  withCommonOptions(
    program
      .command('snapshot')
      .description('Store an introspection result as a new schema version')
      .requiredOption('-k, --key <key>', 'Schema key (e.g., "storefront-api")')
      .requiredOption('-d, --data <data>', 'Introspection result (file path or inline JSON)')
      .option('--set-version <n>', 'Force a specific version number', parseVersion)
  ).action(
    run(async (opts: SnapshotFlags) => {
      const config = resolveSettings(program, opts);
      const evolution = createEvolution(config);
      const snapshot = await evolution.snapshot(
        opts.key,
        readDocumentInput(opts.data),
        opts.setVersion
      );

      console.log(`✅ Schema snapshot saved`);
      console.log(`   Key:     ${snapshot.key}`);
      console.log(`   Version: v${snapshot.version}`);
      console.log(`   Types:   ${snapshot.schema.types.length}`);
      console.log(`   Stored:  ${config.store}`);
    })
  );

  // ─── check Command ────────────────────────────────────────────────────

  withCommonOptions(
    program
      .command('check')
      .description('Check an introspection result against the stored snapshot')
      .requiredOption('-k, --key <key>', 'Schema key')
      .requiredOption('-d, --data <data>', 'Introspection result (file path or inline JSON)')
      .option('--fail-on <severity>', 'Exit with code 1 on: minor, major, critical', 'critical')
  ).action(
    run(async (opts: CheckFlags) => {
      const failOn = parseSeverity(opts.failOn);
      const config = resolveSettings(program, opts);
      const evolution = createEvolution(config);
      const report = await evolution.check(opts.key, readDocumentInput(opts.data));

      emit(evolution.format(report, config.format), opts.output);

      if (report.changes.some((c) => severityRank(c.severity) >= severityRank(failOn))) {
        process.exitCode = 1;
      }
    })
  );

  // ─── diff Command ─────────────────────────────────────────────────────

  withCommonOptions(
    program
      .command('diff')
      .description('Compare two introspection results or two stored versions')
      .option('-k, --key <key>', 'Schema key (for comparing stored versions)')
      .option('--before <data>', 'Before introspection result (file path or inline JSON)')
      .option('--after <data>', 'After introspection result (file path or inline JSON)')
      .option('--v1 <n>', 'Before version number', parseVersion)
      .option('--v2 <n>', 'After version number', parseVersion)
  ).action(
    run(async (opts: DiffFlags) => {
      const config = resolveSettings(program, opts);
      const evolution = createEvolution(config);
      let report: EvolutionReport;

      if (opts.before && opts.after) {
        report = evolution.compare(readDocumentInput(opts.before), readDocumentInput(opts.after));
      } else if (opts.key && opts.v1 !== undefined && opts.v2 !== undefined) {
        report = await evolution.diff(opts.key, opts.v1, opts.v2);
      } else {
        throw new InvalidArgumentError('Provide either --before/--after or --key with --v1/--v2');
      }

      emit(evolution.format(report, config.format), opts.output);
    })
  );

  // ─── sdl Command ──────────────────────────────────────────────────────

  withCommonOptions(
    program
      .command('sdl')
      .description('Render an introspection result as schema definition language')
      .requiredOption('-d, --data <data>', 'Introspection result (file path or inline JSON)')
      .option('-t, --type <name>', 'Render only this type')
      .option('--deep', 'With --type, also render every type it references')
      .option('--descriptions', 'Include descriptions')
      .option('--deprecations', 'Include @deprecated directives')
  ).action(
    run(async (opts: SdlFlags) => {
      const config = resolveSettings(program, opts);
      const evolution = createEvolution(config);
      const sdl = evolution.renderSdl(readDocumentInput(opts.data), {
        typeName: opts.type,
        deep: opts.deep,
        descriptions: opts.descriptions,
        deprecations: opts.deprecations,
      });

      emit(sdl, opts.output);
    })
  );

  // ─── track Command ────────────────────────────────────────────────────

  withCommonOptions(
    program
      .command('track')
      .description('Compatibility metrics across stored versions or a list of files')
      .option('-k, --key <key>', 'Schema key (tracks every stored version)')
      .option('--files <files...>', 'Introspection files, oldest first')
  ).action(
    run(async (opts: TrackFlags) => {
      const config = resolveSettings(program, opts);
      const evolution = createEvolution(config);

      const track = opts.files
        ? evolution.trackDocuments(opts.files.map(readDocumentInput), opts.key)
        : opts.key
          ? await evolution.track(opts.key)
          : undefined;
      if (!track) {
        throw new InvalidArgumentError('Provide either --key or --files');
      }

      emit(evolution.formatTrack(track, config.format), opts.output);
    })
  );

  // ─── list Command ─────────────────────────────────────────────────────

  withCommonOptions(program.command('list').description('List all stored schema keys')).action(
    run(async (opts: CommonFlags) => {
      const evolution = createEvolution(resolveSettings(program, opts));
      const keys = await evolution.listKeys();

      if (keys.length === 0) {
        console.log('📭 No schemas stored yet.');
        return;
      }

      console.log(`📋 Stored schemas (${keys.length}):\n`);
      for (const key of keys) {
        const versions = await evolution.listVersions(key);
        const latest = versions[versions.length - 1];
        console.log(`  • ${key}`);
        console.log(
          latest
            ? `    Latest: v${latest.version} (${latest.timestamp})`
            : '    Latest: unknown'
        );
        console.log('');
      }
    })
  );

  // ─── history Command ──────────────────────────────────────────────────

  withCommonOptions(
    program
      .command('history')
      .description('Show version history for a schema key')
      .requiredOption('-k, --key <key>', 'Schema key')
  ).action(
    run(async (opts: HistoryFlags) => {
      const evolution = createEvolution(resolveSettings(program, opts));
      const versions = await evolution.listVersions(opts.key);

      if (versions.length === 0) {
        console.log(`📭 No versions found for "${opts.key}"`);
        return;
      }

      console.log(`📜 Version history for "${opts.key}":\n`);
      for (const v of versions) {
        console.log(`  v${v.version} — ${v.timestamp} (${v.schema.types.length} types)`);
      }
    })
  );

  return program;
}

// ─── Run ────────────────────────────────────────────────────────────────────

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      reportError(error);
      process.exit(1);
    });
}
