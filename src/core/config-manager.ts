import fs from 'fs';
import path from 'path';
import { EventEmitter } from 'events';
import { MonitorConfiguration } from '../common/interfaces/monitor.interfaces';
import { ConfigInvalidError, errorCode, errorMessage } from '../common/errors';
import { digestOf, parseMonitorConfig } from '../config/monitor-config';
import { CONFIG_RELOAD_DEBOUNCE_DEFAULT_MS } from '../common/time.constants';
import defaultConfig from '../assets/default-config.json';

export type ReloadOutcome = 'applied' | 'rejected' | 'unchanged';

export interface ConfigManagerOptions {
  /** Quiet period after a file change before the reload runs */
  debounceMs?: number;
}

/**
 * Owns the monitor configuration file and its validated snapshot.
 *
 * Events:
 * - `configChanged` (config, warnings) after a candidate was validated and swapped in
 * - `configInvalid` (error) when a candidate was rejected; the previous snapshot stays
 */
export class ConfigManager extends EventEmitter {
  private snapshot: MonitorConfiguration | null = null;
  private lastAttemptDigest: string | null = null;
  private reloadQueue: Promise<void> = Promise.resolve();
  private watcher: fs.FSWatcher | null = null;
  private debounceTimer: NodeJS.Timeout | null = null;
  private readonly debounceMs: number;

  constructor(
    private readonly configPath: string,
    options: ConfigManagerOptions = {},
  ) {
    super();
    this.debounceMs = options.debounceMs ?? CONFIG_RELOAD_DEBOUNCE_DEFAULT_MS;
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Writes the bundled default configuration. An existing file is never
   * overwritten.
   */
  static createDefaultConfig(targetPath: string): void {
    const dir = path.dirname(targetPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    try {
      fs.writeFileSync(targetPath, `${JSON.stringify(defaultConfig, null, 2)}\n`, { flag: 'wx' });
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        throw new Error(`Configuration file already exists: ${targetPath}`);
      }
      throw error;
    }
  }

  /**
   * Loads the configuration file once. Later calls return the current snapshot.
   *
   * @throws {ConfigInvalidError} when the file is missing or invalid
   */
  async initialize(): Promise<MonitorConfiguration> {
    if (this.snapshot) {
      return this.snapshot;
    }

    const text = await this.readSource();
    const { config, warnings } = parseMonitorConfig(text);
    this.logWarnings(warnings);

    this.snapshot = config;
    this.lastAttemptDigest = config.digest;
    console.log(`📋 Loaded configuration from ${this.configPath}: ${config.logFiles.length} log files, ${config.patterns.length} patterns`);
    return config;
  }

  /**
   * Latest validated snapshot
   */
  current(): MonitorConfiguration {
    if (!this.snapshot) {
      throw new Error('Configuration has not been loaded - call initialize() first');
    }
    return this.snapshot;
  }

  /**
   * Re-reads the configuration file. Reloads run one at a time in call order.
   */
  reload(): Promise<ReloadOutcome> {
    const next = this.reloadQueue.then(() => this.performReload());
    this.reloadQueue = next.then(() => undefined, () => undefined);
    return next;
  }

  /**
   * Reloads whenever the configuration file changes on disk
   */
  watch(): void {
    if (this.watcher) return;

    const resolved = path.resolve(this.configPath);
    const fileName = path.basename(resolved);

    try {
      this.watcher = fs.watch(path.dirname(resolved), (_event, changed) => {
        if (changed && changed.toString() !== fileName) return;
        this.scheduleReload();
      });
    } catch (error) {
      console.warn(`⚠️  Cannot watch ${this.configPath} for changes: ${errorMessage(error)}`);
      return;
    }

    this.watcher.on('error', (error) => {
      console.warn(`⚠️  Configuration watcher error: ${error.message}`);
    });
    console.log(`👀 Watching ${this.configPath} for changes`);
  }

  unwatch(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
  }

  private scheduleReload(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.reload().catch((error) => {
        console.error(`❌ Configuration reload failed: ${errorMessage(error)}`);
      });
    }, this.debounceMs);
  }

  private async performReload(): Promise<ReloadOutcome> {
    let text: string;
    try {
      text = await this.readSource();
    } catch (error) {
      if (!(error instanceof ConfigInvalidError)) throw error;
      this.lastAttemptDigest = null;
      this.reject(error);
      return 'rejected';
    }

    const digest = digestOf(text);
    if (digest === this.lastAttemptDigest) {
      return 'unchanged';
    }
    this.lastAttemptDigest = digest;

    try {
      const { config, warnings } = parseMonitorConfig(text);
      this.logWarnings(warnings);
      this.snapshot = config;
      console.log(`🔄 Configuration reloaded: ${config.logFiles.length} log files, ${config.patterns.length} patterns`);
      this.emit('configChanged', config, warnings);
      return 'applied';
    } catch (error) {
      if (!(error instanceof ConfigInvalidError)) throw error;
      this.reject(error);
      return 'rejected';
    }
  }

  private reject(error: ConfigInvalidError): void {
    console.error(`❌ Configuration change rejected, keeping the previous configuration:\n${error.message}`);
    this.emit('configInvalid', error);
  }

  private async readSource(): Promise<string> {
    try {
      return await fs.promises.readFile(this.configPath, 'utf-8');
    } catch (error) {
      const reason = errorCode(error) === 'ENOENT'
        ? `Configuration file not found: ${this.configPath}`
        : `Failed to read configuration ${this.configPath}: ${errorMessage(error)}`;
      throw new ConfigInvalidError(reason, [reason]);
    }
  }

  private logWarnings(warnings: string[]): void {
    if (warnings.length === 0) return;
    console.log('⚠️  Configuration warnings:');
    warnings.forEach(warning => console.log(`  • ${warning}`));
  }
}
