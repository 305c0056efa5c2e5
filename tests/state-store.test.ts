import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PersistedState } from '../src/core/persisted-state.js';
import { JsonStateStore, pruneExpired } from '../src/core/state-store.js';
import { createFakeLogger, makeTempDir, removeTempDir } from './helpers.js';

describe('JsonStateStore', () => {
  let dir: string;
  let path: string;
  let logger: ReturnType<typeof createFakeLogger>;
  let store: JsonStateStore;

  beforeEach(() => {
    dir = makeTempDir();
    path = join(dir, 'data', 'court_states.json');
    logger = createFakeLogger();
    store = new JsonStateStore(path, logger);
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('creates an empty file on first load', () => {
    const state = store.load();

    expect(state.size).toBe(0);
    expect(readFileSync(path, 'utf-8')).toBe('{}\n');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('treats an empty file as an empty history', () => {
    store.load();
    writeFileSync(path, '');

    expect(store.load().size).toBe(0);
    expect(readFileSync(path, 'utf-8')).toBe('{}\n');
  });

  it('loads back exactly what it saved', () => {
    const state = new PersistedState([
      [{ timeLabel: '11H00', date: '2025-01-06' }, { 'Padel 1': 'OCCUPIED', 'Padel 2': 'FREE' }],
      [{ timeLabel: '09H30', date: '2025-01-07' }, { 'Padel 3': 'FREE' }],
    ]);

    expect(store.save(state)).toBe(true);
    expect(store.load().entries()).toEqual(state.entries());
    expect(existsSync(`${path}.bak`)).toBe(false);
  });

  it('writes the libre/occupé file format', () => {
    store.save(
      new PersistedState([
        [{ timeLabel: '11H00', date: '2025-01-06' }, { 'Padel 1': 'OCCUPIED', 'Padel 2': 'FREE' }],
      ])
    );

    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({
      '11H00|2025-01-06': { 'Padel 1': 'occupé', 'Padel 2': 'libre' },
    });
  });

  it('reads files written with legacy "11:00" time labels', () => {
    store.load();
    writeFileSync(path, JSON.stringify({ '11:00|2025-01-06': { 'Padel 1': 'libre' } }));

    expect(store.load().entries()).toEqual([[{ timeLabel: '11H00', date: '2025-01-06' }, { 'Padel 1': 'FREE' }]]);
  });

  it('returns an empty history for garbage bytes without throwing', () => {
    store.load();
    writeFileSync(path, Buffer.from([0xff, 0x00, 0x13, 0x37, 0x7b]));

    expect(store.load().size).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it.each([
    ['an array', '["11H00|2025-01-06"]'],
    ['an unknown status', '{"11H00|2025-01-06": {"Padel 1": "maybe"}}'],
    ['a malformed key', '{"eleven|2025-01-06": {"Padel 1": "libre"}}'],
    ['null', 'null'],
  ])('treats %s as corruption', (_label, content) => {
    store.load();
    writeFileSync(path, content);

    expect(store.load().size).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('keeps the corrupted file until the next save replaces it', () => {
    store.load();
    writeFileSync(path, 'not json');
    store.load();

    expect(readFileSync(path, 'utf-8')).toBe('not json');

    store.save(new PersistedState([[{ timeLabel: '11H00', date: '2025-01-06' }, { 'Padel 1': 'FREE' }]]));
    expect(store.load().size).toBe(1);
  });
});

describe('pruneExpired', () => {
  it('drops rows dated before the horizon', () => {
    const state = new PersistedState([
      [{ timeLabel: '11H00', date: '2025-01-05' }, { 'Padel 1': 'FREE' }],
      [{ timeLabel: '11H00', date: '2025-01-06' }, { 'Padel 1': 'FREE' }],
      [{ timeLabel: '12H00', date: '2025-01-07' }, { 'Padel 1': 'OCCUPIED' }],
    ]);

    expect(pruneExpired(state, '2025-01-06')).toBe(1);
    expect(state.entries().map(([key]) => key.date)).toEqual(['2025-01-06', '2025-01-07']);
  });
});
