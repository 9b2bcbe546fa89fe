import fs from 'fs';
import path from 'path';
import { LogMonitor, LogMonitorOptions } from '../src/core/log-monitor';
import { ConfigManager } from '../src/core/config-manager';
import { OffsetStore } from '../src/core/offset-store';
import { FatalStartupError } from '../src/common/errors';
import { MatchEvent, MonitorState } from '../src/common/interfaces/monitor.interfaces';
import { makeTempDir, RecordingNotifier, removeDir, waitFor, writeJson } from './helpers';

const errorPattern = { name: 'Errors', regex: 'error', severity: 'high', alert_methods: ['console'] };

describe('LogMonitor', () => {
  let dir: string;
  let configPath: string;
  let statePath: string;
  let appLog: string;
  let notifier: RecordingNotifier;
  let monitors: LogMonitor[];
  let spies: jest.SpyInstance[];

  beforeEach(() => {
    dir = makeTempDir('log-monitor');
    configPath = path.join(dir, 'monitor_config.json');
    statePath = path.join(dir, 'monitor_state.json');
    appLog = path.join(dir, 'app.log');
    notifier = new RecordingNotifier('console');
    monitors = [];
    spies = [
      jest.spyOn(console, 'log').mockImplementation(() => undefined),
      jest.spyOn(console, 'warn').mockImplementation(() => undefined),
      jest.spyOn(console, 'error').mockImplementation(() => undefined),
    ];
  });

  afterEach(async () => {
    for (const monitor of monitors) {
      await monitor.stopMonitoring();
    }
    spies.forEach(spy => spy.mockRestore());
    removeDir(dir);
  });

  function writeConfig(logFiles: string[], patterns: object[] = [errorPattern]): void {
    writeJson(configPath, { log_files: logFiles, patterns });
  }

  function createMonitor(overrides: Partial<LogMonitorOptions> = {}): LogMonitor {
    const monitor = new LogMonitor({
      configManager: new ConfigManager(configPath, { debounceMs: 10 }),
      offsetStore: new OffsetStore(statePath),
      notifierFactory: () => [notifier],
      retryPolicy: { maxAttempts: 1, backoffMs: 1, maxBackoffMs: 1 },
      ...overrides,
    });
    monitors.push(monitor);
    return monitor;
  }

  function persistedOffset(target: string): number | undefined {
    const state = JSON.parse(fs.readFileSync(statePath, 'utf-8'));
    return state[target]?.offset;
  }

  it('should alert on matching lines and checkpoint the offset', async () => {
    const content = 'ok\nan error happened\n';
    fs.writeFileSync(appLog, content);
    writeConfig([appLog]);
    const monitor = createMonitor();
    const matches: MatchEvent[] = [];
    monitor.on('match', (event: MatchEvent) => matches.push(event));

    await monitor.initialize();
    const summary = await monitor.runSweep();

    expect(summary).toEqual({ targets: 1, linesProcessed: 2, matches: 1, checkpoints: 1 });
    expect(notifier.sent).toHaveLength(1);
    expect(notifier.sent[0]?.match.matchedText).toBe('an error happened');
    expect(notifier.sent[0]?.origin.source).toBe(appLog);
    expect(matches[0]?.deliveries).toEqual([{ channel: 'console', status: 'delivered' }]);
    expect(persistedOffset(appLog)).toBe(Buffer.byteLength(content));
  });

  it('should not rewrite the state file when nothing changed', async () => {
    fs.writeFileSync(appLog, 'an error\n');
    writeConfig([appLog]);
    const store = new OffsetStore(statePath);
    const saveSpy = jest.spyOn(store, 'save');
    const monitor = createMonitor({ offsetStore: store });

    await monitor.initialize();
    await monitor.runSweep();
    const second = await monitor.runSweep();

    expect(second).toEqual({ targets: 1, linesProcessed: 0, matches: 0, checkpoints: 0 });
    expect(saveSpy).toHaveBeenCalledTimes(1);
  });

  it('should not checkpoint while only a partial line or a timestamp change arrives', async () => {
    fs.writeFileSync(appLog, 'an error\n');
    writeConfig([appLog]);
    const store = new OffsetStore(statePath);
    const saveSpy = jest.spyOn(store, 'save');
    const monitor = createMonitor({ offsetStore: store });
    await monitor.initialize();
    await monitor.runSweep();

    fs.appendFileSync(appLog, 'partial without newline');
    const afterAppend = await monitor.runSweep();
    fs.utimesSync(appLog, new Date(2030, 0, 1), new Date(2030, 0, 1));
    const afterTouch = await monitor.runSweep();

    expect(afterAppend).toEqual({ targets: 1, linesProcessed: 0, matches: 0, checkpoints: 0 });
    expect(afterTouch).toEqual({ targets: 1, linesProcessed: 0, matches: 0, checkpoints: 0 });
    expect(saveSpy).toHaveBeenCalledTimes(1);
    expect(persistedOffset(appLog)).toBe(9);
  });

  it('should resume from the persisted offset after a restart', async () => {
    fs.writeFileSync(appLog, 'first error\n');
    writeConfig([appLog]);
    const first = createMonitor();
    await first.initialize();
    await first.runSweep();
    await first.stopMonitoring();

    fs.appendFileSync(appLog, 'second error\n');
    const second = createMonitor();
    await second.initialize();
    const summary = await second.runSweep();

    expect(summary.linesProcessed).toBe(1);
    expect(notifier.sent.map(alert => alert.match.matchedText)).toEqual(['first error', 'second error']);
  });

  it('should read a truncated file again from the start', async () => {
    fs.writeFileSync(appLog, 'a long line without problems\n');
    writeConfig([appLog]);
    const monitor = createMonitor();
    const truncated = jest.fn();
    monitor.on('targetTruncated', truncated);
    await monitor.initialize();
    await monitor.runSweep();

    fs.writeFileSync(appLog, 'error again\n');
    await monitor.runSweep();

    expect(truncated).toHaveBeenCalledWith(expect.objectContaining({ path: appLog }));
    expect(notifier.sent.map(alert => alert.match.matchedText)).toEqual(['error again']);
    expect(monitor.getHealthStatus().metrics.truncationsDetected).toBe(1);
    expect(persistedOffset(appLog)).toBe(12);
  });

  it('should evaluate patterns across the trailing lines of a target', async () => {
    fs.writeFileSync(appLog, 'login failed for bob\naccount locked: bob\n');
    writeConfig([appLog], [{
      name: 'Lockout',
      regex: 'login failed, account locked',
      match_type: 'all',
      context: 2,
      severity: 'high',
      alert_methods: ['console'],
    }]);
    const monitor = createMonitor();
    await monitor.initialize();

    const summary = await monitor.runSweep();

    expect(summary.matches).toBe(1);
    expect(notifier.sent[0]?.match.matchedText).toBe('account locked: bob');
  });

  it('should keep monitoring other targets when one is missing and pick it up later', async () => {
    const missing = path.join(dir, 'later.log');
    fs.writeFileSync(appLog, '');
    writeConfig([appLog, missing]);
    const monitor = createMonitor();
    const targetErrors = jest.fn();
    monitor.on('targetError', targetErrors);

    await monitor.initialize();

    expect(targetErrors).toHaveBeenCalledWith(expect.objectContaining({ path: missing, reason: 'NotFound' }));
    const status = monitor.getHealthStatus().targets.find(target => target.path === missing);
    expect(status).toMatchObject({ open: false, lastError: `Log source not found: ${missing}` });

    fs.writeFileSync(missing, 'late error\n');
    const summary = await monitor.runSweep();

    expect(summary.matches).toBe(1);
    expect(notifier.sent[0]?.origin.source).toBe(missing);
  });

  it('should refuse to start when no target can be opened', async () => {
    writeConfig([path.join(dir, 'nope.log')]);

    await expect(createMonitor().initialize()).rejects.toThrow(FatalStartupError);
  });

  it('should refuse to start without log files', async () => {
    writeConfig([]);

    await expect(createMonitor().initialize()).rejects.toThrow('No log files configured - nothing to monitor');
  });

  it('should keep the current rules when a reload is rejected', async () => {
    fs.writeFileSync(appLog, '');
    writeConfig([appLog]);
    const manager = new ConfigManager(configPath);
    const monitor = createMonitor({ configManager: manager });
    const rejected = jest.fn();
    monitor.on('configurationRejected', rejected);
    await monitor.initialize();

    fs.writeFileSync(configPath, '{ "log_files": ');
    expect(await manager.reload()).toBe('rejected');

    fs.appendFileSync(appLog, 'still an error\n');
    const summary = await monitor.runSweep();

    expect(summary.matches).toBe(1);
    expect(rejected).toHaveBeenCalledTimes(1);
    expect(monitor.getHealthStatus().metrics.reloadsRejected).toBe(1);
  });

  it('should apply a reloaded configuration at the next sweep', async () => {
    const authLog = path.join(dir, 'auth.log');
    fs.writeFileSync(appLog, 'an error\n');
    fs.writeFileSync(authLog, 'warn: disk almost full\n');
    writeConfig([appLog]);
    const manager = new ConfigManager(configPath);
    const monitor = createMonitor({ configManager: manager });
    const applied = jest.fn();
    const states: MonitorState[] = [];
    monitor.on('configurationApplied', applied);
    monitor.on('stateChanged', (change: { current: MonitorState }) => states.push(change.current));
    await monitor.initialize();
    await monitor.runSweep();

    writeConfig([authLog], [{ name: 'Warnings', regex: 'warn', severity: 'low', alert_methods: ['console'] }]);
    expect(await manager.reload()).toBe('applied');
    const summary = await monitor.runSweep();

    expect(applied).toHaveBeenCalledTimes(1);
    expect(summary).toEqual({ targets: 1, linesProcessed: 1, matches: 1, checkpoints: 1 });
    expect(notifier.sent.map(alert => alert.match.patternName)).toEqual(['Errors', 'Warnings']);
    expect(states).toEqual(['INITIALIZING', 'RELOADING', 'INITIALIZING']);
    expect(monitor.getHealthStatus().targets.map(target => target.path)).toEqual([authLog]);
    expect(persistedOffset(appLog)).toBe(9);
  });

  it('should keep live offsets and reopen a re-added file from its record', async () => {
    const otherLog = path.join(dir, 'other.log');
    fs.writeFileSync(appLog, 'error a1\n');
    fs.writeFileSync(otherLog, 'error b1\n');
    writeConfig([appLog, otherLog]);
    const manager = new ConfigManager(configPath);
    const monitor = createMonitor({ configManager: manager });
    await monitor.initialize();
    await monitor.runSweep();

    writeConfig([appLog]);
    expect(await manager.reload()).toBe('applied');
    fs.appendFileSync(appLog, 'error a2\n');
    fs.appendFileSync(otherLog, 'error b2\n');
    const withoutOther = await monitor.runSweep();

    writeConfig([appLog, otherLog]);
    expect(await manager.reload()).toBe('applied');
    const withOther = await monitor.runSweep();

    expect(withoutOther).toEqual({ targets: 1, linesProcessed: 1, matches: 1, checkpoints: 1 });
    expect(withOther).toEqual({ targets: 2, linesProcessed: 1, matches: 1, checkpoints: 1 });
    expect(notifier.sent.map(alert => alert.match.matchedText)).toEqual(['error a1', 'error b1', 'error a2', 'error b2']);
    expect(persistedOffset(appLog)).toBe(18);
    expect(persistedOffset(otherLog)).toBe(18);
  });

  it('should run until stopped and write a final checkpoint', async () => {
    fs.writeFileSync(appLog, 'boot error\n');
    writeConfig([appLog]);
    const monitor = createMonitor({ pollIntervalMs: 100 });
    const states: MonitorState[] = [];
    const stopped = jest.fn();
    monitor.on('stateChanged', (change: { current: MonitorState }) => states.push(change.current));
    monitor.on('monitoringStopped', stopped);

    await monitor.startMonitoring();
    await waitFor(() => notifier.sent.length === 1);
    fs.appendFileSync(appLog, 'late error\n');
    await waitFor(() => notifier.sent.length === 2);
    await monitor.stopMonitoring();

    expect(states).toEqual(['INITIALIZING', 'RUNNING', 'STOPPING', 'STOPPED']);
    expect(stopped).toHaveBeenCalledTimes(1);
    expect(monitor.getHealthStatus().isHealthy).toBe(false);
    expect(persistedOffset(appLog)).toBe(22);
  });

  it('should report health while running', async () => {
    fs.writeFileSync(appLog, '');
    writeConfig([appLog]);
    const monitor = createMonitor({ pollIntervalMs: 100 });

    await monitor.startMonitoring();
    await waitFor(() => monitor.getHealthStatus().metrics.sweepsCompleted > 0);
    const health = monitor.getHealthStatus();

    expect(health.isHealthy).toBe(true);
    expect(health.state).toBe('RUNNING');
    expect(health.targets).toEqual([expect.objectContaining({ path: appLog, open: true, offset: 0 })]);
  });
});
