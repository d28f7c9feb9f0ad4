import { afterEach, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SessionStore } from '../session_store.js';
import { createMessage } from '../context.js';

const tempDirs: string[] = [];

function tempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tether-sessions-'));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('SessionStore', () => {
  it('creates an empty session on first access', () => {
    const store = new SessionStore({ persistDir: null });
    expect(store.get('alice')).toEqual([]);
  });

  it('replaces the history on set', () => {
    const store = new SessionStore({ persistDir: null });
    const messages = [createMessage('user', 'hi', 1), createMessage('assistant', 'hello', 2)];
    store.set('alice', messages);
    expect(store.get('alice')).toEqual(messages);
  });

  it('evicts sessions idle longer than the ttl', () => {
    let now = 0;
    const store = new SessionStore({ persistDir: null, ttlMs: 1000, now: () => now });
    store.get('idle');
    now = 800;
    store.get('active');
    now = 1500;

    expect(store.evictIdle()).toEqual(['idle']);
    now = 1900;
    expect(store.evictIdle()).toEqual(['active']);
  });

  it('reloads a persisted session after eviction', () => {
    const dir = tempDir();
    let now = 0;
    const store = new SessionStore({ persistDir: dir, ttlMs: 10, now: () => now });
    const messages = [
      createMessage('user', [{ type: 'text', text: 'look' }, { type: 'image', data: 'aGk=', mimeType: 'image/png' }], 5),
    ];
    store.set('bob', messages);

    now = 100;
    expect(store.evictIdle()).toEqual(['bob']);
    expect(store.get('bob')).toEqual(messages);
  });

  it('ignores a malformed session file', () => {
    const dir = tempDir();
    fs.writeFileSync(path.join(dir, 'carol.json'), JSON.stringify({ userId: 'carol', messages: [{ role: 'robot' }] }));
    const store = new SessionStore({ persistDir: dir });
    expect(store.get('carol')).toEqual([]);
  });

  it('deletes the persisted copy', () => {
    const dir = tempDir();
    const store = new SessionStore({ persistDir: dir });
    store.set('dave', [createMessage('user', 'hi', 1)]);
    expect(fs.existsSync(path.join(dir, 'dave.json'))).toBe(true);

    expect(store.delete('dave')).toBe(true);
    expect(fs.existsSync(path.join(dir, 'dave.json'))).toBe(false);
    expect(store.get('dave')).toEqual([]);
  });

  it('maps unsafe user ids to safe file names', () => {
    const dir = tempDir();
    const store = new SessionStore({ persistDir: dir });
    store.set('../evil/user', [createMessage('user', 'x', 1)]);
    expect(fs.readdirSync(dir)).toEqual(['%2E%2E%2Fevil%2Fuser.json']);
  });

  it('keeps ids that differ only in punctuation apart', () => {
    const dir = tempDir();
    const first = new SessionStore({ persistDir: dir });
    first.set('a/b', [createMessage('user', 'slash', 1)]);
    first.set('a_b', [createMessage('user', 'underscore', 2)]);

    const reopened = new SessionStore({ persistDir: dir });
    expect(reopened.get('a/b').map(m => m.content)).toEqual(['slash']);
    expect(reopened.get('a_b').map(m => m.content)).toEqual(['underscore']);
    expect(fs.readdirSync(dir).sort()).toEqual(['a%2Fb.json', 'a_b.json']);
  });
});
