import http from 'http';
import chalk from 'chalk';
import { DaemonConfig } from '../config/daemon-config';
import { PlatformLogReader } from '../common/interfaces/log-source.interface';
import { MatchEvent } from '../common/interfaces/monitor.interfaces';
import { ConfigInvalidError, FatalStartupError, errorMessage } from '../common/errors';
import { runHttpBasedHealthCheck } from '../utils/utils';
import { ConfigManager } from './config-manager';
import { LogMonitor } from './log-monitor';
import { createLogSourceResolver } from './log-source';
import { OffsetStore } from './offset-store';

export interface RunningDaemon {
  monitor: LogMonitor;
  configManager: ConfigManager;
  healthServer: http.Server | null;
}

export interface StartDaemonOptions {
  /** Serves `eventlog:<name>` targets; without one they stay unavailable */
  platformReader?: PlatformLogReader;
}

/**
 * Writes the default configuration to the configured path
 *
 * @returns process exit code
 */
export function createDefaultConfigFile(config: DaemonConfig): number {
  const { configPath } = config.getPaths();
  try {
    ConfigManager.createDefaultConfig(configPath);
  } catch (error) {
    console.error(`${chalk.red('❌ Could not create configuration:')} ${errorMessage(error)}`);
    return 1;
  }

  console.log(`✅ Default configuration written to ${configPath}`);
  console.log('💡 Edit log_files, patterns and channels, then start with --start');
  return 0;
}

/**
 * Wires configuration, offset state and the monitor loop and starts monitoring
 *
 * @throws {FatalStartupError} when the configuration is invalid or nothing can be monitored
 */
export async function startDaemon(config: DaemonConfig, options: StartDaemonOptions = {}): Promise<RunningDaemon> {
  const paths = config.getPaths();
  const monitoring = config.getMonitoringConfig();
  const alerting = config.getAlertingConfig();

  const configManager = new ConfigManager(paths.configPath, {
    debounceMs: monitoring.configReloadDebounceMs,
  });

  try {
    await configManager.initialize();
  } catch (error) {
    if (error instanceof ConfigInvalidError) {
      throw new FatalStartupError(`Invalid configuration ${paths.configPath}: ${error.message}`);
    }
    throw error;
  }

  const monitor = new LogMonitor({
    configManager,
    offsetStore: new OffsetStore(paths.statePath),
    resolveLogSource: createLogSourceResolver({
      maxBatchBytes: monitoring.maxBatchBytes,
      platformReader: options.platformReader,
    }),
    pollIntervalMs: monitoring.pollIntervalMs,
    enableFileWatch: monitoring.enableFileWatch,
    deliveryTimeoutMs: alerting.deliveryTimeoutMs,
    retryPolicy: alerting.retryPolicy,
  });

  monitor.on('match', (event: MatchEvent) => {
    const failed = event.deliveries.filter(delivery => delivery.status === 'failed').length;
    if (failed > 0) {
      console.log(`🚨 ${event.match.patternName} in ${event.origin.source}: ${failed}/${event.deliveries.length} deliveries failed`);
    }
  });

  monitor.on('monitoringStarted', (event: { targetsMonitored: number }) => {
    console.log(`✅ Monitoring started for ${event.targetsMonitored} log targets`);
  });

  monitor.on('monitoringStopped', (event: { metrics: { matchesDetected: number } }) => {
    console.log(`🛑 Monitoring stopped. Total matches detected: ${event.metrics.matchesDetected}`);
  });

  monitor.on('configurationApplied', (event: { digest: string }) => {
    console.log(`📋 Configuration ${event.digest.slice(0, 12)} applied`);
  });

  await monitor.initialize();
  await monitor.startMonitoring();

  const healthConfig = config.getHealthCheckConfig();
  const healthServer = healthConfig.enabled ? runHttpBasedHealthCheck(healthConfig, monitor) : null;

  return { monitor, configManager, healthServer };
}
