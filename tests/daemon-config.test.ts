import { DaemonConfig } from '../src/config/daemon-config';

describe('DaemonConfig', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('should apply defaults to an empty environment', () => {
    const config = DaemonConfig.fromEnvironment({});

    expect(config.getNodeEnv()).toBe('development');
    expect(config.getPaths()).toEqual({
      configPath: 'monitor_config.json',
      statePath: 'monitor_state.json',
    });
    expect(config.getMonitoringConfig()).toEqual({
      pollIntervalMs: 1000,
      maxBatchBytes: 1048576,
      enableFileWatch: true,
      configReloadDebounceMs: 250,
    });
    expect(config.getAlertingConfig()).toEqual({
      deliveryTimeoutMs: 5000,
      retryPolicy: { maxAttempts: 3, backoffMs: 1000, maxBackoffMs: 30000 },
    });
    expect(config.getHealthCheckConfig()).toEqual({ enabled: false, port: 3000 });
  });

  it('should convert string values from the environment', () => {
    const config = DaemonConfig.fromEnvironment({
      NODE_ENV: 'production',
      MONITOR_CONFIG_PATH: '/etc/logalert/config.json',
      POLL_INTERVAL_MS: '250',
      ENABLE_FILE_WATCH: 'false',
      ENABLE_HEALTH_CHECK: 'true',
      HEALTH_CHECK_PORT: '8081',
    });

    expect(config.getPaths().configPath).toBe('/etc/logalert/config.json');
    expect(config.getMonitoringConfig().pollIntervalMs).toBe(250);
    expect(config.getMonitoringConfig().enableFileWatch).toBe(false);
    expect(config.getHealthCheckConfig()).toEqual({ enabled: true, port: 8081 });
    expect(config.getNodeEnv()).toBe('production');
  });

  it('should reject values out of range', () => {
    expect(() => DaemonConfig.fromEnvironment({ POLL_INTERVAL_MS: '50' }))
      .toThrow('POLL_INTERVAL_MS: "POLL_INTERVAL_MS" must be greater than or equal to 100');
  });

  it('should list every violation at once', () => {
    let message = '';
    try {
      DaemonConfig.fromEnvironment({ ALERT_MAX_ATTEMPTS: '0', HEALTH_CHECK_PORT: '80' });
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }

    expect(message).toContain('❌ Environment variable validation failed:');
    expect(message).toContain('  • ALERT_MAX_ATTEMPTS: "ALERT_MAX_ATTEMPTS" must be greater than or equal to 1');
    expect(message).toContain('  • HEALTH_CHECK_PORT: "HEALTH_CHECK_PORT" must be greater than or equal to 1024');
  });

  it('should reject an unknown NODE_ENV', () => {
    expect(() => DaemonConfig.fromEnvironment({ NODE_ENV: 'qa' })).toThrow(/NODE_ENV: /);
  });

  it('should warn when the initial backoff exceeds the maximum', () => {
    const config = DaemonConfig.fromEnvironment({ ALERT_BACKOFF_MS: '5000', ALERT_MAX_BACKOFF_MS: '1000' });

    expect(config.getAlertingConfig().retryPolicy).toEqual({ maxAttempts: 3, backoffMs: 5000, maxBackoffMs: 1000 });
    expect(logSpy).toHaveBeenCalledWith(
      '  • ALERT_BACKOFF_MS exceeds ALERT_MAX_BACKOFF_MS - retries will wait ALERT_MAX_BACKOFF_MS',
    );
  });

  it('should warn when configuration and state share a file', () => {
    DaemonConfig.fromEnvironment({ MONITOR_CONFIG_PATH: 'same.json', MONITOR_STATE_PATH: 'same.json' });

    expect(logSpy).toHaveBeenCalledWith('  • MONITOR_CONFIG_PATH and MONITOR_STATE_PATH point to the same file');
  });
});
