import { mkdtempSync, readFileSync, rmSync, writeFileSync, mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { StateStore } from '../src/store/state-store';
import { makeListing } from './helpers/listings';

describe('StateStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'job-watch-state-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads an empty snapshot when the file is missing', () => {
    expect(new StateStore(join(dir, 'state.json')).load()).toEqual([]);
  });

  it('reads back what it saved', () => {
    const store = new StateStore(join(dir, 'state.json'));
    const records = [makeListing('Tornero'), makeListing('Fresador', 'Metalúrgica Sur')];

    expect(store.save(records)).toBe(true);
    expect(store.load()).toEqual(records);
  });

  it('writes indented UTF-8 JSON', () => {
    const file = join(dir, 'state.json');
    const records = [makeListing('Técnico en refrigeración', 'Frío Litoral')];

    new StateStore(file).save(records);

    expect(readFileSync(file, 'utf-8')).toBe(`${JSON.stringify(records, null, 2)}\n`);
  });

  it('replaces the previous snapshot on save', () => {
    const store = new StateStore(join(dir, 'state.json'));

    store.save([makeListing('Uno'), makeListing('Dos')]);
    store.save([makeListing('Tres')]);

    expect(store.load().map(r => r.title)).toEqual(['Tres']);
  });

  it('creates missing parent directories', () => {
    const store = new StateStore(join(dir, 'nested', 'deeper', 'state.json'));

    expect(store.save([makeListing('Uno')])).toBe(true);
    expect(store.load()).toHaveLength(1);
  });

  it('degrades to an empty snapshot on invalid JSON', () => {
    const file = join(dir, 'state.json');
    writeFileSync(file, '[{"title": "Uno",', 'utf-8');

    expect(new StateStore(file).load()).toEqual([]);
  });

  it('degrades to an empty snapshot on an unexpected shape', () => {
    const file = join(dir, 'state.json');
    writeFileSync(file, JSON.stringify({ ofertas: [] }), 'utf-8');

    expect(new StateStore(file).load()).toEqual([]);
  });

  it('rejects records without a fingerprint', () => {
    const file = join(dir, 'state.json');
    const { fingerprint: _omitted, ...withoutFingerprint } = makeListing('Uno');
    writeFileSync(file, JSON.stringify([withoutFingerprint]), 'utf-8');

    expect(new StateStore(file).load()).toEqual([]);
  });

  it('reports a failed write instead of throwing', () => {
    const file = join(dir, 'occupied');
    mkdirSync(file);

    expect(new StateStore(file).save([makeListing('Uno')])).toBe(false);
  });
});
