import fs from 'fs';
import { EventEmitter } from 'events';
import {
  AlertRetryPolicy,
  MatchEvent,
  MonitorConfiguration,
  MonitorMetrics,
  MonitorState,
  OffsetRecord,
  SweepSummary,
  TargetStatus,
} from '../common/interfaces/monitor.interfaces';
import { LogSource, LogSourceHandle, ReadBatch } from '../common/interfaces/log-source.interface';
import { NotifierFactory } from '../common/interfaces/notifier.interface';
import { ConfigInvalidError, FatalStartupError, SourceUnavailableError, errorMessage } from '../common/errors';
import {
  DELIVERY_TIMEOUT_DEFAULT_MS,
  FILE_WATCH_DEBOUNCE_MS,
  POLL_INTERVAL_DEFAULT_MS,
} from '../common/time.constants';
import { AlertRouter, DEFAULT_RETRY_POLICY } from './alert-router';
import { ConfigManager } from './config-manager';
import { DEFAULT_MAX_BATCH_BYTES, LogSourceResolver, createLogSourceResolver, isPlatformLog } from './log-source';
import { createNotifiers } from './notifiers';
import { OffsetStore } from './offset-store';
import { evaluate, requiredHistory } from './pattern-engine';

export interface LogMonitorOptions {
  configManager: ConfigManager;
  offsetStore: OffsetStore;
  resolveLogSource?: LogSourceResolver;
  pollIntervalMs?: number;
  maxBatchBytes?: number;
  enableFileWatch?: boolean;
  deliveryTimeoutMs?: number;
  retryPolicy?: AlertRetryPolicy;
  notifierFactory?: NotifierFactory;
}

export interface MonitorHealthStatus {
  isHealthy: boolean;
  state: MonitorState;
  configuration: { digest: string; loadedAt: Date } | null;
  targets: TargetStatus[];
  metrics: MonitorMetrics;
}

interface MonitoredTarget {
  path: string;
  source: LogSource;
  handle: LogSourceHandle | null;
  /** Newest lines last, bounded by the widest pattern context */
  history: string[];
  watcher: fs.FSWatcher | null;
  consecutiveFailures: number;
  lastError: string | null;
  lastReadAt: Date | null;
}

/**
 * Log monitoring loop
 *
 * Sweeps every configured target on a fixed interval: reads the lines appended
 * since the last checkpoint, evaluates them against the current pattern set,
 * dispatches each match and checkpoints the target's offset once its batch is
 * handled. A crash between dispatch and checkpoint replays the batch on the
 * next start, so every line is processed at least once.
 *
 * Lifecycle: IDLE → INITIALIZING → RUNNING ⇄ RELOADING → STOPPING → STOPPED
 */
export class LogMonitor extends EventEmitter {
  private readonly configManager: ConfigManager;
  private readonly offsetStore: OffsetStore;
  private readonly resolveLogSource: LogSourceResolver;
  private readonly notifierFactory: NotifierFactory;
  private readonly pollIntervalMs: number;
  private readonly enableFileWatch: boolean;
  private readonly deliveryTimeoutMs: number;
  private readonly retryPolicy: AlertRetryPolicy;

  private state: MonitorState = 'IDLE';
  private config: MonitorConfiguration | null = null;
  private pendingConfig: MonitorConfiguration | null = null;
  private router: AlertRouter | null = null;
  private historySize = 1;

  private readonly targets = new Map<string, MonitoredTarget>();
  /** Last persisted record of every target ever seen, including removed ones */
  private records = new Map<string, OffsetRecord>();

  private sweepTimer: NodeJS.Timeout | null = null;
  private wakeTimer: NodeJS.Timeout | null = null;
  private sweepInFlight: Promise<SweepSummary> | null = null;
  private wakeRequested = false;

  private readonly metrics: MonitorMetrics = {
    sweepsCompleted: 0,
    linesProcessed: 0,
    matchesDetected: 0,
    alertsDelivered: 0,
    deliveryFailures: 0,
    readErrors: 0,
    truncationsDetected: 0,
    checkpointsWritten: 0,
    reloadsApplied: 0,
    reloadsRejected: 0,
    lastSweepAt: null,
  };

  private readonly onConfigChanged = (config: MonitorConfiguration): void => {
    this.pendingConfig = config;
    this.requestWake();
  };

  private readonly onConfigInvalid = (error: ConfigInvalidError): void => {
    this.metrics.reloadsRejected++;
    this.emit('configurationRejected', { timestamp: new Date(), problems: error.problems, message: error.message });
  };

  constructor(options: LogMonitorOptions) {
    super();
    this.configManager = options.configManager;
    this.offsetStore = options.offsetStore;
    this.resolveLogSource = options.resolveLogSource
      ?? createLogSourceResolver({ maxBatchBytes: options.maxBatchBytes ?? DEFAULT_MAX_BATCH_BYTES });
    this.notifierFactory = options.notifierFactory ?? createNotifiers;
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_DEFAULT_MS;
    this.enableFileWatch = options.enableFileWatch ?? false;
    this.deliveryTimeoutMs = options.deliveryTimeoutMs ?? DELIVERY_TIMEOUT_DEFAULT_MS;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  }

  getState(): MonitorState {
    return this.state;
  }

  /**
   * Loads the configuration and the persisted offsets and opens every target.
   *
   * @throws {FatalStartupError} when no log file is configured or none can be opened
   */
  public async initialize(): Promise<void> {
    if (this.state !== 'IDLE') {
      throw new Error(`Cannot initialize a monitor in state ${this.state}`);
    }
    this.setState('INITIALIZING');
    console.log('🔄 Initializing log monitor...');

    const config = await this.configManager.initialize();
    if (config.logFiles.length === 0) {
      this.setState('STOPPED');
      throw new FatalStartupError('No log files configured - nothing to monitor');
    }

    this.records = this.offsetStore.load();
    this.useConfiguration(config);

    for (const targetPath of config.logFiles) {
      await this.addTarget(targetPath);
    }

    const opened = Array.from(this.targets.values()).filter(target => target.handle !== null);
    if (opened.length === 0) {
      this.setState('STOPPED');
      throw new FatalStartupError(`None of the ${config.logFiles.length} configured log files could be opened`);
    }

    this.configManager.on('configChanged', this.onConfigChanged);
    this.configManager.on('configInvalid', this.onConfigInvalid);

    console.log(`✅ Log monitor initialized: ${opened.length}/${config.logFiles.length} targets open`);
  }

  /**
   * Starts the sweep schedule and the configuration watcher
   */
  public async startMonitoring(): Promise<void> {
    if (this.state === 'IDLE') {
      await this.initialize();
    }
    if (this.state !== 'INITIALIZING') {
      throw new Error(`Cannot start monitoring in state ${this.state}`);
    }

    this.setState('RUNNING');
    this.configManager.watch();
    this.scheduleNextSweep(0);

    this.emit('monitoringStarted', {
      timestamp: new Date(),
      targetsMonitored: this.targets.size,
      pollIntervalMs: this.pollIntervalMs,
    });
  }

  /**
   * Stops scheduling, lets the target batch in flight finish and writes a
   * final checkpoint.
   */
  public async stopMonitoring(): Promise<void> {
    if (this.state === 'STOPPED' || this.state === 'STOPPING') return;

    console.log('🛑 Initiating graceful monitoring shutdown...');
    this.setState('STOPPING');

    if (this.sweepTimer) {
      clearTimeout(this.sweepTimer);
      this.sweepTimer = null;
    }
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    this.configManager.unwatch();
    this.configManager.off('configChanged', this.onConfigChanged);
    this.configManager.off('configInvalid', this.onConfigInvalid);

    if (this.sweepInFlight) {
      try {
        await this.sweepInFlight;
      } catch (error) {
        console.error(`❌ Sweep in flight failed during shutdown: ${errorMessage(error)}`);
      }
    }

    for (const target of this.targets.values()) {
      this.checkpoint(target);
      await this.closeTarget(target);
    }

    this.setState('STOPPED');
    console.log('✅ Monitoring shutdown complete');

    this.emit('monitoringStopped', {
      timestamp: new Date(),
      metrics: { ...this.metrics },
    });
  }

  /**
   * One pass over every target. Concurrent calls share the sweep in flight.
   */
  public runSweep(): Promise<SweepSummary> {
    if (!this.sweepInFlight) {
      this.sweepInFlight = this.performSweep().finally(() => {
        this.sweepInFlight = null;
      });
    }
    return this.sweepInFlight;
  }

  public getHealthStatus(): MonitorHealthStatus {
    const targets = Array.from(this.targets.values()).map(target => this.describeTarget(target));
    return {
      isHealthy: (this.state === 'RUNNING' || this.state === 'RELOADING') && targets.some(target => target.open),
      state: this.state,
      configuration: this.config ? { digest: this.config.digest, loadedAt: this.config.loadedAt } : null,
      targets,
      metrics: { ...this.metrics },
    };
  }

  private setState(next: MonitorState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    this.emit('stateChanged', { previous, current: next });
  }

  private useConfiguration(config: MonitorConfiguration): void {
    this.config = config;
    this.historySize = requiredHistory(config.patterns);
    const notifiers = this.notifierFactory(config.channels, { deliveryTimeoutMs: this.deliveryTimeoutMs });
    this.router = new AlertRouter(config, notifiers, {
      deliveryTimeoutMs: this.deliveryTimeoutMs,
      retryPolicy: this.retryPolicy,
    });
  }

  private async performSweep(): Promise<SweepSummary> {
    const summary: SweepSummary = { targets: 0, linesProcessed: 0, matches: 0, checkpoints: 0 };

    if (this.pendingConfig) {
      const next = this.pendingConfig;
      this.pendingConfig = null;
      await this.applyConfiguration(next);
    }

    for (const target of Array.from(this.targets.values())) {
      if (this.state === 'STOPPING' || this.state === 'STOPPED') break;
      summary.targets++;
      await this.processTarget(target, summary);
    }

    this.metrics.sweepsCompleted++;
    this.metrics.lastSweepAt = new Date();
    return summary;
  }

  /**
   * Swaps in a new snapshot. Targets still configured keep their handles and
   * history, removed ones are closed with their records left in the state
   * file, added ones open from their persisted offset.
   */
  private async applyConfiguration(config: MonitorConfiguration): Promise<void> {
    const resumeState = this.state;
    this.setState('RELOADING');

    this.useConfiguration(config);

    const wanted = new Set(config.logFiles);
    for (const target of Array.from(this.targets.values())) {
      if (!wanted.has(target.path)) {
        this.checkpoint(target);
        await this.closeTarget(target);
        this.targets.delete(target.path);
        console.log(`📕 Stopped monitoring ${target.path}`);
      } else if (target.history.length > this.historySize) {
        target.history = target.history.slice(-this.historySize);
      }
    }

    for (const targetPath of config.logFiles) {
      if (!this.targets.has(targetPath)) {
        await this.addTarget(targetPath);
      }
    }

    this.metrics.reloadsApplied++;
    this.emit('configurationApplied', {
      timestamp: new Date(),
      digest: config.digest,
      logFiles: [...config.logFiles],
      patterns: config.patterns.length,
    });

    if (this.state === 'RELOADING') {
      this.setState(resumeState === 'RELOADING' ? 'RUNNING' : resumeState);
    }
  }

  private async addTarget(targetPath: string): Promise<void> {
    const target: MonitoredTarget = {
      path: targetPath,
      source: this.resolveLogSource(targetPath),
      handle: null,
      history: [],
      watcher: null,
      consecutiveFailures: 0,
      lastError: null,
      lastReadAt: null,
    };
    this.targets.set(targetPath, target);
    await this.openTarget(target);
  }

  private async openTarget(target: MonitoredTarget): Promise<boolean> {
    const record = this.records.get(target.path);
    try {
      target.handle = await target.source.openAt(target.path, record?.offset ?? 0, record?.fingerprint ?? null);
    } catch (error) {
      this.recordFailure(target, error);
      return false;
    }

    if (target.consecutiveFailures > 0) {
      console.log(`🔗 Reopened ${target.path}`);
    }
    console.log(`📖 Monitoring ${target.path} from offset ${target.handle.offset}`);
    this.watchTarget(target);
    return true;
  }

  private async closeTarget(target: MonitoredTarget): Promise<void> {
    if (target.watcher) {
      target.watcher.close();
      target.watcher = null;
    }
    if (!target.handle) return;

    const handle = target.handle;
    target.handle = null;
    try {
      await target.source.close(handle);
    } catch (error) {
      console.warn(`⚠️ Error closing ${target.path}: ${errorMessage(error)}`);
    }
  }

  private async processTarget(target: MonitoredTarget, summary: SweepSummary): Promise<void> {
    if (!target.handle && !(await this.openTarget(target))) {
      return;
    }
    const handle = target.handle;
    const config = this.config;
    const router = this.router;
    if (!handle || !config || !router) return;

    let batch: ReadBatch;
    try {
      batch = await target.source.readNewLines(handle);
    } catch (error) {
      this.recordFailure(target, error);
      if (error instanceof SourceUnavailableError && error.reason !== 'ReadFailed') {
        await this.closeTarget(target);
      }
      return;
    }

    if (batch.truncated) {
      this.metrics.truncationsDetected++;
      target.history = [];
      console.warn(`✂️  ${target.path} was truncated - reading again from the start`);
      this.emit('targetTruncated', { path: target.path, timestamp: new Date() });
    }

    target.consecutiveFailures = 0;
    target.lastError = null;
    target.lastReadAt = new Date();

    for (const line of batch.lines) {
      target.history.push(line);
      if (target.history.length > this.historySize) {
        target.history.shift();
      }

      summary.linesProcessed++;
      this.metrics.linesProcessed++;

      for (const match of evaluate(target.history, config.patterns)) {
        summary.matches++;
        this.metrics.matchesDetected++;

        const origin = { source: target.path, timestamp: new Date() };
        const deliveries = await router.dispatch(match, origin);
        for (const delivery of deliveries) {
          if (delivery.status === 'delivered') this.metrics.alertsDelivered++;
          if (delivery.status === 'failed') this.metrics.deliveryFailures++;
        }

        const event: MatchEvent = { match, origin, deliveries };
        this.emit('match', event);
      }
    }

    if (this.checkpoint(target)) {
      summary.checkpoints++;
    }
  }

  /**
   * Persists the target's offset when it moved since the last checkpoint
   */
  private checkpoint(target: MonitoredTarget): boolean {
    if (!target.handle) return false;

    const previous = this.records.get(target.path);
    const next: OffsetRecord = {
      path: target.path,
      offset: target.handle.offset,
      fingerprint: target.handle.fingerprint,
    };
    if (previous && previous.offset === next.offset) {
      return false;
    }

    const records = new Map(this.records);
    records.set(target.path, next);
    try {
      this.offsetStore.save(records);
    } catch (error) {
      console.error(`❌ Failed to checkpoint ${target.path}: ${errorMessage(error)}`);
      return false;
    }

    this.records = records;
    this.metrics.checkpointsWritten++;
    return true;
  }

  private recordFailure(target: MonitoredTarget, error: unknown): void {
    const message = errorMessage(error);
    target.consecutiveFailures++;
    this.metrics.readErrors++;

    // Log the first failure of a streak, not every retry.
    if (target.lastError !== message) {
      console.warn(`⚠️ ${message} - retrying next sweep`);
    }
    target.lastError = message;

    this.emit('targetError', {
      path: target.path,
      error: message,
      reason: error instanceof SourceUnavailableError ? error.reason : 'ReadFailed',
      consecutiveFailures: target.consecutiveFailures,
    });
  }

  private describeTarget(target: MonitoredTarget): TargetStatus {
    const record = this.records.get(target.path);
    return {
      path: target.path,
      open: target.handle !== null,
      offset: target.handle?.offset ?? record?.offset ?? 0,
      fingerprint: target.handle?.fingerprint ?? record?.fingerprint ?? null,
      consecutiveFailures: target.consecutiveFailures,
      lastError: target.lastError,
      lastReadAt: target.lastReadAt,
    };
  }

  private watchTarget(target: MonitoredTarget): void {
    if (!this.enableFileWatch || target.watcher || isPlatformLog(target.path)) return;

    try {
      target.watcher = fs.watch(target.path, () => this.requestWake());
      target.watcher.on('error', (error) => {
        console.warn(`⚠️ File watcher for ${target.path} failed: ${error.message}`);
        target.watcher?.close();
        target.watcher = null;
      });
    } catch (error) {
      console.warn(`⚠️ Cannot watch ${target.path}, relying on polling: ${errorMessage(error)}`);
    }
  }

  /**
   * Runs a sweep soon instead of at the next poll tick
   */
  private requestWake(): void {
    if (this.state !== 'RUNNING' && this.state !== 'RELOADING') return;
    if (this.wakeTimer) return;

    this.wakeTimer = setTimeout(() => {
      this.wakeTimer = null;
      if (this.sweepInFlight) {
        this.wakeRequested = true;
      } else {
        this.scheduleNextSweep(0);
      }
    }, FILE_WATCH_DEBOUNCE_MS);
  }

  private scheduleNextSweep(delayMs: number): void {
    if (this.state !== 'RUNNING' && this.state !== 'RELOADING') return;

    if (this.sweepTimer) {
      clearTimeout(this.sweepTimer);
    }
    this.sweepTimer = setTimeout(() => {
      this.sweepTimer = null;
      this.runSweep().then(
        () => this.afterSweep(),
        (error) => {
          console.error(`❌ Sweep failed: ${errorMessage(error)}`);
          this.afterSweep();
        },
      );
    }, delayMs);
  }

  private afterSweep(): void {
    const immediate = this.wakeRequested;
    this.wakeRequested = false;
    this.scheduleNextSweep(immediate ? 0 : this.pollIntervalMs);
  }
}
