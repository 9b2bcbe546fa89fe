import fs from 'fs';
import path from 'path';
import { OffsetStore } from '../src/core/offset-store';
import { StateCorruptError } from '../src/common/errors';
import { OffsetRecord } from '../src/common/interfaces/monitor.interfaces';
import { makeTempDir, removeDir } from './helpers';

describe('OffsetStore', () => {
  let dir: string;
  let statePath: string;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    dir = makeTempDir('offset-store');
    statePath = path.join(dir, 'state.json');
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
    removeDir(dir);
  });

  function records(...entries: OffsetRecord[]): Map<string, OffsetRecord> {
    return new Map(entries.map(entry => [entry.path, entry]));
  }

  it('should start empty when no state file exists', () => {
    expect(new OffsetStore(statePath).load().size).toBe(0);
  });

  it('should round-trip saved offsets', () => {
    const store = new OffsetStore(statePath);
    store.save(records(
      { path: '/var/log/a.log', offset: 42, fingerprint: '7:42:1000' },
      { path: 'eventlog:Security', offset: 9, fingerprint: null },
    ));

    const loaded = new OffsetStore(statePath).load();

    expect(loaded.get('/var/log/a.log')).toEqual({ path: '/var/log/a.log', offset: 42, fingerprint: '7:42:1000' });
    expect(loaded.get('eventlog:Security')).toEqual({ path: 'eventlog:Security', offset: 9, fingerprint: null });
  });

  it('should write the state file as a path-keyed mapping and leave no temp file', () => {
    new OffsetStore(statePath).save(records({ path: '/var/log/a.log', offset: 3, fingerprint: null }));

    expect(JSON.parse(fs.readFileSync(statePath, 'utf-8'))).toEqual({
      '/var/log/a.log': { offset: 3, fingerprint: null },
    });
    expect(fs.readdirSync(dir)).toEqual(['state.json']);
  });

  it('should create the state directory when missing', () => {
    const nested = path.join(dir, 'var', 'lib', 'state.json');
    new OffsetStore(nested).save(records({ path: '/x.log', offset: 1, fingerprint: null }));

    expect(fs.existsSync(nested)).toBe(true);
  });

  it('should treat a corrupt state file as empty and warn', () => {
    fs.writeFileSync(statePath, '{ not json');
    const store = new OffsetStore(statePath);

    expect(() => store.readState()).toThrow(StateCorruptError);
    expect(store.load().size).toBe(0);
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('starting from empty offset state'));
  });

  it('should reject a state file that is not a mapping', () => {
    fs.writeFileSync(statePath, '[1, 2, 3]');

    expect(() => new OffsetStore(statePath).readState())
      .toThrow(`Offset state ${statePath} is not a mapping of paths to offsets`);
  });

  it('should drop individually invalid entries', () => {
    fs.writeFileSync(statePath, JSON.stringify({
      '/bad.log': { offset: -1 },
      '/text.log': { offset: '12' },
      '/good.log': { offset: 5 },
    }));

    const loaded = new OffsetStore(statePath).load();

    expect(Array.from(loaded.values())).toEqual([{ path: '/good.log', offset: 5, fingerprint: null }]);
    expect(warnSpy).toHaveBeenCalledTimes(2);
  });

  it('should treat a blank state file as empty', () => {
    fs.writeFileSync(statePath, '  \n');

    expect(new OffsetStore(statePath).readState().size).toBe(0);
  });
});
