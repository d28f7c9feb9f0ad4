import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileMemoryStore, keywords } from '../memory_store.js';

describe('keywords', () => {
  it('drops short words and stop words', () => {
    expect(keywords('What is the capital of France?')).toEqual(['capital', 'france']);
  });
});

describe('FileMemoryStore', () => {
  let tmpDir: string | null = null;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = null;
  });

  it('rejects blank content', async () => {
    const store = new FileMemoryStore(null);
    await expect(store.addMemory('u1', '   ', 'general', 'explicit_save')).rejects.toThrow('Memory content cannot be empty');
    expect(await store.retrieveMemory('u1', '', 10)).toEqual([]);
  });

  it('trims content and defaults the category', async () => {
    const store = new FileMemoryStore(null);
    const item = await store.addMemory('u1', '  likes green tea  ', '', 'explicit_save');
    expect(item.content).toBe('likes green tea');
    expect(item.category).toBe('general');
    expect(item.userId).toBe('u1');
  });

  it('ranks by keyword overlap and keeps users apart', async () => {
    const store = new FileMemoryStore(null);
    await store.addMemory('u1', 'Works as a nurse in Lisbon', 'work', 'explicit_save');
    await store.addMemory('u1', 'Allergic to peanuts', 'health', 'explicit_save');
    await store.addMemory('u1', 'Moved to Lisbon for work as a nurse on night shifts', 'work', 'explicit_save');
    await store.addMemory('u2', 'Lives in Lisbon', 'home', 'explicit_save');

    const hits = await store.retrieveMemory('u1', 'nurse shifts in Lisbon', 5);
    expect(hits.map(h => h.content)).toEqual([
      'Moved to Lisbon for work as a nurse on night shifts',
      'Works as a nurse in Lisbon',
    ]);
  });

  it('returns the newest memories for a blank query', async () => {
    const store = new FileMemoryStore(null);
    await store.addMemory('u1', 'first', 'general', 'explicit_save');
    await store.addMemory('u1', 'second', 'general', 'explicit_save');
    await store.addMemory('u1', 'third', 'general', 'explicit_save');

    const recent = await store.retrieveMemory('u1', '', 2);
    expect(recent.map(h => h.content)).toEqual(['third', 'second']);
    expect(await store.retrieveMemory('u1', '', 0)).toEqual([]);
  });

  it('persists to disk and reloads', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'memory-store-'));
    const file = path.join(tmpDir, 'nested', 'memory.json');

    const store = new FileMemoryStore(file);
    const item = await store.addMemory('u1', 'Prefers metric units', 'preferences', 'explicit_save');

    const reloaded = new FileMemoryStore(file);
    expect(await reloaded.retrieveMemory('u1', '', 10)).toEqual([item]);
    expect(await reloaded.retrieveMemory('u2', '', 10)).toEqual([]);
  });

  it('starts empty when the file has the wrong shape', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'memory-store-'));
    const file = path.join(tmpDir, 'memory.json');
    fs.writeFileSync(file, JSON.stringify({ not: 'a list' }));

    expect(await new FileMemoryStore(file).retrieveMemory('u1', '', 10)).toEqual([]);
  });
});
