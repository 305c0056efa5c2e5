import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { USAGE, runCli, type CliIO } from '../src/cli.js';
import { makeTempDir, removeTempDir } from './helpers.js';

const JAN_5 = () => new Date('2025-01-05T10:00:00Z');
const JAN_10 = () => new Date('2025-01-10T10:00:00Z');

describe('runCli', () => {
  let dir: string;
  let dataDir: string;
  let configArg: string;
  let out: string[];
  let err: string[];
  let io: CliIO;

  function writeInput(name: string, content: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, JSON.stringify(content));
    return `--input=${path}`;
  }

  function scrapeInput(status: 'FREE' | 'OCCUPIED') {
    return {
      snapshot: [{ timeLabel: '11H00', date: '2025-01-06', courts: { 'Padel 1': status } }],
      bookableDates: ['2025-01-06', '2025-01-13'],
    };
  }

  beforeEach(() => {
    dir = makeTempDir();
    dataDir = join(dir, 'data');
    const configPath = join(dir, 'config.yaml');
    writeFileSync(configPath, `storage:\n  dataDir: ${JSON.stringify(dataDir)}\nlogging:\n  level: ERROR\n`);
    configArg = `--config=${configPath}`;
    out = [];
    err = [];
    io = {
      stdout: (line) => out.push(line),
      stderr: (line) => err.push(line),
    };
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('prints usage for an unknown command', async () => {
    expect(await runCli(['explode', configArg], io)).toBe(2);
    expect(err).toEqual([USAGE]);
  });

  it('fails on a configuration error', async () => {
    expect(await runCli(['status', `--config=${join(dir, 'missing.yaml')}`], io)).toBe(1);
    expect(err[0]).toMatch(/^Configuration error:\n/);
  });

  it('init creates both store files', async () => {
    expect(await runCli(['init', configArg], io)).toBe(0);

    expect(out).toEqual([
      `State file: ${join(dataDir, 'court_states.json')}`,
      `Dates file: ${join(dataDir, 'known_dates.json')}`,
    ]);
    expect(readFileSync(join(dataDir, 'court_states.json'), 'utf-8')).toBe('{}\n');
    expect(readFileSync(join(dataDir, 'known_dates.json'), 'utf-8')).toBe('{}\n');
  });

  it('process prints the change report of each scrape', async () => {
    expect(await runCli(['process', configArg, writeInput('first.json', scrapeInput('OCCUPIED'))], io, JAN_5)).toBe(0);
    expect(JSON.parse(out[0])).toEqual({
      freedSlots: [],
      newDates: [
        { type: 'NEW_DATE', date: '2025-01-06' },
        { type: 'NEW_DATE', date: '2025-01-13' },
      ],
      persisted: true,
    });

    expect(await runCli(['process', configArg, writeInput('second.json', scrapeInput('FREE'))], io, JAN_5)).toBe(0);
    expect(JSON.parse(out[1])).toEqual({
      freedSlots: [{ type: 'SLOT_FREED', timeLabel: '11H00', courtId: 'Padel 1', date: '2025-01-06' }],
      newDates: [],
      persisted: true,
    });
  });

  it('status summarises the stores', async () => {
    await runCli(['process', configArg, writeInput('scrape.json', scrapeInput('FREE'))], io, JAN_5);
    out.length = 0;

    expect(await runCli(['status', configArg], io)).toBe(0);
    expect(out).toEqual(['Tracked slot rows: 1', 'Known dates: 2', '  2025-01: 2025-01-06, 2025-01-13']);
  });

  it('prune drops rows before the horizon', async () => {
    await runCli(['process', configArg, writeInput('scrape.json', scrapeInput('FREE'))], io, JAN_5);
    out.length = 0;

    expect(await runCli(['prune', configArg], io, JAN_10)).toBe(0);
    expect(out).toEqual(['Pruned 1 slot row(s) dated before 2025-01-10']);
  });

  it('process rejects an invalid scrape result', async () => {
    const input = writeInput('bad.json', {
      snapshot: [{ timeLabel: '11H00', date: '2025-01-06', courts: { 'Padel 1': 'MAYBE' } }],
    });

    expect(await runCli(['process', configArg, input], io)).toBe(1);
    expect(err[0]).toMatch(/^Invalid scrape result in /);
  });

  it('process reports an unreadable input file', async () => {
    expect(await runCli(['process', configArg, `--input=${join(dir, 'nope.json')}`], io)).toBe(1);
    expect(err[0]).toMatch(/^Cannot read /);
  });

  it('process requires an input file', async () => {
    expect(await runCli(['process', configArg], io)).toBe(2);
    expect(err).toEqual(['Missing --input=FILE']);
  });
});
