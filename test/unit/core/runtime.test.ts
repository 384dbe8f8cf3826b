import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { existsSync } from 'fs';
import { Runtime } from '../../../src/core/runtime.js';
import { defaultConfig } from '../../../src/core/types.js';
import { quickLlmUnit } from '../../../src/graph/builder.js';
import { makeTempDir, removeDir } from '../../helpers/fixtures.js';
import { MockGenerator } from '../../helpers/mock-generator.js';

describe('Runtime', () => {
  let dir: string;
  let generator: MockGenerator;
  let runtime: Runtime;

  beforeEach(async () => {
    dir = makeTempDir('runtime');
    generator = new MockGenerator(['hello back']);
    runtime = await Runtime.create({ config: defaultConfig(), projectDir: dir, generator });
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should resolve storage under the project directory', () => {
    expect(runtime.units.pathFor('u1')).toBe(join(dir, 'units', 'u1.json'));
    expect(runtime.registry.size).toBe(31);
    expect(runtime.generator).toBe(generator);
  });

  it('should run a unit through the interpreter', async () => {
    const result = await runtime.run(quickLlmUnit('Echo', 'Echo: {input}'), { input: 'hi' });
    expect(result.success).toBe(true);
    expect(result.result).toBe('hello back');
    expect(generator.prompts).toEqual(['Echo: hi']);
  });

  it('should run stored units by id', async () => {
    const unit = quickLlmUnit('Echo', 'Echo: {input}');
    await runtime.units.save(unit);
    expect(existsSync(runtime.units.pathFor(unit.id))).toBe(true);

    const result = await runtime.runStored(unit.id, { input: 'again' });
    expect(result?.result).toBe('hello back');
    expect(await runtime.runStored('missing')).toBeNull();
  });
});
