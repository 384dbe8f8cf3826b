import { Unit } from '../graph/unit.js';
import type { UnitRecord } from '../graph/schema.js';
import { PersistenceError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { jsonPath, listJsonNames, pathExists, readJson, removeFile, writeJson } from '../utils/fs.js';

/**
 * One JSON file per unit, named by unit id.
 */
export class UnitStore {
  constructor(private readonly dir: string) {}

  get directory(): string {
    return this.dir;
  }

  pathFor(id: string): string {
    return jsonPath(this.dir, id);
  }

  exists(id: string): boolean {
    return pathExists(this.pathFor(id));
  }

  /**
   * Persist a unit, overwriting any previous record. Returns the file path.
   */
  async save(unit: Unit): Promise<string> {
    const path = this.pathFor(unit.id);
    try {
      await writeJson(path, unit.toRecord());
    } catch (err) {
      throw new PersistenceError(`Failed to save unit ${unit.id}`, path, toError(err));
    }
    return path;
  }

  /**
   * Null when no record exists; a corrupt record throws.
   */
  async load(id: string): Promise<Unit | null> {
    const path = this.pathFor(id);
    let raw: unknown;
    try {
      raw = await readJson(path);
    } catch (err) {
      throw new PersistenceError(`Unit record ${id} is not valid JSON`, path, toError(err));
    }
    if (raw === null) return null;
    return Unit.fromRecord(raw);
  }

  async ids(): Promise<string[]> {
    return listJsonNames(this.dir);
  }

  /**
   * Every readable unit. Unreadable records are logged and skipped.
   */
  async list(): Promise<Unit[]> {
    const units: Unit[] = [];
    for (const id of await this.ids()) {
      try {
        const unit = await this.load(id);
        if (unit) units.push(unit);
      } catch (err) {
        getLogger().warn({ id, err: toError(err).message }, 'Skipping unreadable unit record');
      }
    }
    return units;
  }

  async records(): Promise<UnitRecord[]> {
    return (await this.list()).map(unit => unit.toRecord());
  }

  async remove(id: string): Promise<boolean> {
    return removeFile(this.pathFor(id));
  }
}
