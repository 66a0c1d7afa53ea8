/**
 * File-based Schema Snapshot Store
 *
 * Stores introspection snapshots as JSON files on the local filesystem.
 * No database required. Git-friendly format for version control.
 *
 * Directory structure:
 *   <storeDir>/
 *     <sanitized-key>/
 *       latest.json        → copy of the latest version
 *       v1.json
 *       v2.json
 *       ...
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { SchemaStore, SchemaSnapshot } from '../core/types';
import { CorruptSnapshotError, InvalidKeyError, describeError } from '../core/errors';
import { introspectionSchemaSchema } from '../formats/introspection';
import { Logger, logger as defaultLogger } from '../logger';

const snapshotSchema: z.ZodType<SchemaSnapshot> = z.object({
  key: z.string(),
  schema: introspectionSchemaSchema,
  timestamp: z.string(),
  version: z.number().int().positive(),
  metadata: z.record(z.unknown()).optional(),
});

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Sanitize a key to be a valid directory name. Empty and dot-only results
 * (`.`, `..`) get a `_` prefix so they never name the store or its parent.
 */
export function sanitizeKey(key: string): string {
  const sanitized = key
    .replace(/^https?:\/\//, '')
    .replace(/[^a-zA-Z0-9_\-./]/g, '_')
    .replace(/\//g, '__')
    .replace(/_{3,}/g, '__')
    .substring(0, 200);
  return /^\.*$/.test(sanitized) ? `_${sanitized}` : sanitized;
}

const VERSION_FILE = /^v(\d+)\.json$/;

function readSnapshot(filePath: string): SchemaSnapshot {
  try {
    return snapshotSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  } catch (error) {
    throw new CorruptSnapshotError(filePath, error);
  }
}

// ─── File Store Implementation ──────────────────────────────────────────────

export class FileStore implements SchemaStore {
  private readonly baseDir: string;
  private readonly logger: Logger;

  constructor(baseDir: string, logger: Logger = defaultLogger) {
    this.baseDir = path.resolve(baseDir);
    this.logger = logger;
  }

  private keyDir(key: string): string {
    const dir = path.join(this.baseDir, sanitizeKey(key));
    if (path.dirname(dir) !== this.baseDir) {
      throw new InvalidKeyError(key);
    }
    return dir;
  }

  private versionPath(key: string, version: number): string {
    return path.join(this.keyDir(key), `v${version}.json`);
  }

  private latestPath(key: string): string {
    return path.join(this.keyDir(key), 'latest.json');
  }

  private highestVersion(key: string): number {
    const dir = this.keyDir(key);
    if (!fs.existsSync(dir)) return 0;

    return fs.readdirSync(dir).reduce((highest, file) => {
      const match = VERSION_FILE.exec(file);
      return match ? Math.max(highest, Number(match[1])) : highest;
    }, 0);
  }

  /**
   * Save a schema snapshot. Writes the versioned file, and latest.json when
   * the version is not older than any stored one.
   */
  async save(snapshot: SchemaSnapshot): Promise<void> {
    const highest = this.highestVersion(snapshot.key);
    fs.mkdirSync(this.keyDir(snapshot.key), { recursive: true });
    const data = JSON.stringify(snapshot, null, 2);

    fs.writeFileSync(this.versionPath(snapshot.key, snapshot.version), data, 'utf-8');
    if (snapshot.version >= highest) {
      fs.writeFileSync(this.latestPath(snapshot.key), data, 'utf-8');
    }
    this.logger.debug('Snapshot written', {
      key: snapshot.key,
      version: snapshot.version,
      latest: Math.max(highest, snapshot.version),
    });
  }

  /**
   * Load the latest snapshot for a key.
   */
  async load(key: string): Promise<SchemaSnapshot | null> {
    const lPath = this.latestPath(key);
    if (!fs.existsSync(lPath)) return null;
    return readSnapshot(lPath);
  }

  /**
   * Load a specific version.
   */
  async loadVersion(key: string, version: number): Promise<SchemaSnapshot | null> {
    const vPath = this.versionPath(key, version);
    if (!fs.existsSync(vPath)) return null;
    return readSnapshot(vPath);
  }

  /**
   * List all versions for a key, sorted by version number ascending.
   * Unreadable version files are logged and skipped.
   */
  async listVersions(key: string): Promise<SchemaSnapshot[]> {
    const dir = this.keyDir(key);
    if (!fs.existsSync(dir)) return [];

    const files = fs.readdirSync(dir).filter((f) => VERSION_FILE.test(f));
    const snapshots: SchemaSnapshot[] = [];

    for (const file of files) {
      try {
        snapshots.push(readSnapshot(path.join(dir, file)));
      } catch (error) {
        this.logger.warn('Skipping unreadable snapshot', { file, error: describeError(error) });
      }
    }

    return snapshots.sort((a, b) => a.version - b.version);
  }

  /**
   * List all known keys (directories holding a latest.json).
   */
  async listKeys(): Promise<string[]> {
    if (!fs.existsSync(this.baseDir)) return [];

    const entries = fs.readdirSync(this.baseDir, { withFileTypes: true });
    const keys: string[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const latestFile = path.join(this.baseDir, entry.name, 'latest.json');
      if (!fs.existsSync(latestFile)) continue;

      try {
        keys.push(readSnapshot(latestFile).key);
      } catch (error) {
        this.logger.warn('Using directory name for unreadable snapshot', {
          dir: entry.name,
          error: describeError(error),
        });
        keys.push(entry.name);
      }
    }

    return keys.sort();
  }

  /**
   * Delete a key and all its versions.
   */
  async delete(key: string): Promise<void> {
    const dir = this.keyDir(key);
    if (fs.existsSync(dir)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  }
}
