import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { BlueprintLibrary } from '../../../src/blueprints/library.js';
import { PersistenceError, ValidationError } from '../../../src/core/errors.js';
import { makeTempDir, removeDir } from '../../helpers/fixtures.js';

describe('BlueprintLibrary', () => {
  const library = new BlueprintLibrary();

  // ─── Lookup ───

  it('should list the shipped blueprints by canonical name', async () => {
    expect(await library.list()).toEqual([
      'act',
      'feedback',
      'feedback_learn',
      'feedback_passthrough',
      'parallel',
      'sense',
      'sense_passthrough',
    ]);
  });

  it('should find a blueprint under its decorated file name', async () => {
    expect((await library.load('parallel'))?.id).toBe('parallel_blueprint');
    expect(await library.has('act')).toBe(true);
  });

  it('should return null for an unknown blueprint', async () => {
    expect(await library.load('nope')).toBeNull();
    expect(await library.instantiate('nope')).toBeNull();
  });

  it('should hand out independent copies', async () => {
    const first = await library.load('act');
    if (first) first.intent = 'changed';
    expect((await library.load('act'))?.intent).toBe('INTENT_PLACEHOLDER');
  });

  // ─── Instantiation ───

  describe('instantiate', () => {
    it('should create a fresh unit with the given intent and id', async () => {
      const unit = await library.instantiate('act', { intent: 'Say hi', id: 'u1' });
      expect(unit?.id).toBe('u1');
      expect(unit?.intent).toBe('Say hi');
      expect(unit?.type).toBe('act');
      expect(unit?.metadata.version).toBe(1);
      expect(unit?.metadata.parentId).toBeNull();
      expect(unit?.nodes.every(n => n.state === 'pending')).toBe(true);
    });

    it('should rewire the input key and prompt', async () => {
      const unit = await library.instantiate('act', {
        customize: { inputKey: 'question', prompt: 'Answer: {input}' },
      });
      expect(unit?.getNode('s1')?.args).toEqual({ key: 'question' });
      expect(unit?.getNode('a1')?.args).toEqual({ prompt: 'Answer: {input}' });
    });

    it('should replace trailing task nodes with one per parallel task', async () => {
      const unit = await library.instantiate('parallel', {
        customize: { parallelTasks: ['Summarise', 'Translate'] },
      });
      expect(unit?.nodes.map(n => n.id)).toEqual(['s1', 'task_1', 'task_2']);
      expect(unit?.edges).toEqual([
        { from: 's1', to: 'task_1' },
        { from: 's1', to: 'task_2' },
      ]);
      const task = unit?.getNode('task_2');
      expect(task?.description).toBe('Translate');
      expect(task?.input).toEqual({ kind: 'var', name: 'input' });
      expect(task?.args).toEqual({ prompt: 'Translate: {input}' });
      expect(task?.output).toBe('task_2');
    });

    it('should apply node patches and scalar overrides', async () => {
      const unit = await library.instantiate('act', {
        customize: { nodes: [{ id: 'a1', description: 'Think' }], type: 'composite', tension: 0.9, importance: 0.1 },
      });
      expect(unit?.getNode('a1')?.description).toBe('Think');
      expect(unit?.type).toBe('composite');
      expect(unit?.tension).toBe(0.9);
      expect(unit?.importance).toBe(0.1);
    });

    it('should reject customisations that break the unit', async () => {
      await expect(library.instantiate('act', { customize: { tension: 2 } })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  // ─── Custom directories ───

  describe('with a custom directory', () => {
    let dir: string;

    beforeEach(() => {
      dir = makeTempDir('blueprints');
    });

    afterEach(() => {
      removeDir(dir);
    });

    it('should read prefixed file names', async () => {
      const record = {
        id: 'custom',
        type: 'act',
        intent: 'Custom',
        tension: 0.5,
        importance: 0.5,
        nodes: [{ id: 'n1', type: 'output', phase: 'act', description: 'Emit', primitive: 'emit' }],
        edges: [],
      };
      writeFileSync(join(dir, 'blueprint_custom.json'), JSON.stringify(record));
      const custom = new BlueprintLibrary(dir);
      expect(await custom.list()).toEqual(['custom']);
      expect((await custom.instantiate('custom', { id: 'c1' }))?.nodes.map(n => n.id)).toEqual(['n1']);
    });

    it('should report an unreadable blueprint', async () => {
      writeFileSync(join(dir, 'broken.json'), '{');
      await expect(new BlueprintLibrary(dir).load('broken')).rejects.toBeInstanceOf(PersistenceError);
    });
  });
});
