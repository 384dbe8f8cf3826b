import { MemoryUnit } from '../memory/memory-unit.js';
import { PersistenceError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { jsonPath, listJsonNames, readJson, removeFile, writeJson } from '../utils/fs.js';

/**
 * One JSON file per memory, named by memory id.
 */
export class MemoryStore {
  constructor(private readonly dir: string) {}

  get directory(): string {
    return this.dir;
  }

  pathFor(id: string): string {
    return jsonPath(this.dir, id);
  }

  /**
   * Every readable memory. Bad files are logged and skipped.
   */
  async loadAll(): Promise<MemoryUnit[]> {
    const memories: MemoryUnit[] = [];
    for (const id of await listJsonNames(this.dir)) {
      try {
        memories.push(MemoryUnit.fromRecord(await readJson(this.pathFor(id))));
      } catch (err) {
        getLogger().warn({ id, err: toError(err).message }, 'Failed to load memory');
      }
    }
    return memories;
  }

  async save(memory: MemoryUnit): Promise<void> {
    const path = this.pathFor(memory.id);
    try {
      await writeJson(path, memory.toRecord());
    } catch (err) {
      throw new PersistenceError(`Failed to save memory ${memory.id}`, path, toError(err));
    }
  }

  async remove(id: string): Promise<boolean> {
    return removeFile(this.pathFor(id));
  }
}
