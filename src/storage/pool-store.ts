import { readdir } from 'fs/promises';
import { join } from 'path';
import { Unit } from '../graph/unit.js';
import { PersistenceError, toError } from '../core/errors.js';
import { jsonPath, listJsonNames, moveFile, pathExists, readJson, writeJson } from '../utils/fs.js';

const ARCHIVE_DIR = 'archive';

/**
 * Named pools of competing units: `<root>/<pool>/<name>.json`.
 * Pruned members are moved to `<root>/archive/<pool>/`, never deleted.
 */
export class PoolStore {
  constructor(private readonly root: string) {}

  get directory(): string {
    return this.root;
  }

  memberPath(pool: string, name: string): string {
    return jsonPath(join(this.root, pool), name);
  }

  archivePath(pool: string, name: string): string {
    return jsonPath(join(this.root, ARCHIVE_DIR, pool), name);
  }

  async pools(): Promise<string[]> {
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      return entries
        .filter(e => e.isDirectory() && e.name !== ARCHIVE_DIR)
        .map(e => e.name)
        .sort();
    } catch {
      return [];
    }
  }

  async members(pool: string): Promise<string[]> {
    return listJsonNames(join(this.root, pool));
  }

  async archived(pool: string): Promise<string[]> {
    return listJsonNames(join(this.root, ARCHIVE_DIR, pool));
  }

  exists(pool: string, name: string): boolean {
    return pathExists(this.memberPath(pool, name));
  }

  async load(pool: string, name: string): Promise<Unit | null> {
    const path = this.memberPath(pool, name);
    let raw: unknown;
    try {
      raw = await readJson(path);
    } catch (err) {
      throw new PersistenceError(`Pool member ${pool}/${name} is not valid JSON`, path, toError(err));
    }
    if (raw === null) return null;
    return Unit.fromRecord(raw);
  }

  async save(pool: string, name: string, unit: Unit): Promise<string> {
    const path = this.memberPath(pool, name);
    try {
      await writeJson(path, unit.toRecord());
    } catch (err) {
      throw new PersistenceError(`Failed to save pool member ${pool}/${name}`, path, toError(err));
    }
    return path;
  }

  /**
   * Move a member into the archive. False when it does not exist.
   */
  async archive(pool: string, name: string): Promise<boolean> {
    const from = this.memberPath(pool, name);
    if (!pathExists(from)) return false;
    const to = this.archivePath(pool, name);
    try {
      await moveFile(from, to);
    } catch (err) {
      throw new PersistenceError(`Failed to archive ${pool}/${name}`, to, toError(err));
    }
    return true;
  }
}
