import Joi from 'joi';
import { AlertRetryPolicy } from '../common/interfaces/monitor.interfaces';
import {
  POLL_INTERVAL_MIN_MS,
  POLL_INTERVAL_MAX_MS,
  POLL_INTERVAL_DEFAULT_MS,
  CONFIG_RELOAD_DEBOUNCE_MAX_MS,
  CONFIG_RELOAD_DEBOUNCE_DEFAULT_MS,
  DELIVERY_TIMEOUT_MIN_MS,
  DELIVERY_TIMEOUT_MAX_MS,
  DELIVERY_TIMEOUT_DEFAULT_MS,
  ALERT_BACKOFF_MIN_MS,
  ALERT_BACKOFF_MAX_MS,
  ALERT_BACKOFF_DEFAULT_MS,
  ALERT_MAX_BACKOFF_MIN_MS,
  ALERT_MAX_BACKOFF_MAX_MS,
  ALERT_MAX_BACKOFF_DEFAULT_MS,
} from '../common/time.constants';

const ONE_KIBIBYTE = 1024;
const ONE_MEBIBYTE = 1024 * ONE_KIBIBYTE;

interface EnvironmentValues {
  NODE_ENV: string;
  MONITOR_CONFIG_PATH: string;
  MONITOR_STATE_PATH: string;
  POLL_INTERVAL_MS: number;
  MAX_BATCH_BYTES: number;
  ENABLE_FILE_WATCH: boolean;
  CONFIG_RELOAD_DEBOUNCE_MS: number;
  DELIVERY_TIMEOUT_MS: number;
  ALERT_MAX_ATTEMPTS: number;
  ALERT_BACKOFF_MS: number;
  ALERT_MAX_BACKOFF_MS: number;
  ENABLE_HEALTH_CHECK: boolean;
  HEALTH_CHECK_PORT: number;
}

/**
 * Environment variable validation schema using Joi
 * This schema defines validation rules, default values, and detailed error messages
 * for all environment variables used by the daemon
 */
const environmentSchema = Joi.object<EnvironmentValues>({
  // ====================================
  // APPLICATION CONFIGURATION
  // ====================================
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'staging', 'test')
    .default('development')
    .description('Node.js environment mode'),

  // ====================================
  // FILE LOCATIONS
  // ====================================
  MONITOR_CONFIG_PATH: Joi.string()
    .default('monitor_config.json')
    .description('Path of the JSON file holding log files, patterns and channels'),

  MONITOR_STATE_PATH: Joi.string()
    .default('monitor_state.json')
    .description('Path of the JSON file holding persisted read offsets'),

  // ====================================
  // MONITORING CONFIGURATION
  // ====================================
  POLL_INTERVAL_MS: Joi.number()
    .integer()
    .min(POLL_INTERVAL_MIN_MS)
    .max(POLL_INTERVAL_MAX_MS)
    .default(POLL_INTERVAL_DEFAULT_MS)
    .description('Delay between two sweeps over the monitored files (milliseconds)'),

  MAX_BATCH_BYTES: Joi.number()
    .integer()
    .min(ONE_KIBIBYTE)
    .max(64 * ONE_MEBIBYTE)
    .default(ONE_MEBIBYTE)
    .description('Maximum bytes read from one file in one sweep'),

  ENABLE_FILE_WATCH: Joi.boolean()
    .default(true)
    .description('Wake the sweep early when a monitored file changes'),

  CONFIG_RELOAD_DEBOUNCE_MS: Joi.number()
    .integer()
    .min(0)
    .max(CONFIG_RELOAD_DEBOUNCE_MAX_MS)
    .default(CONFIG_RELOAD_DEBOUNCE_DEFAULT_MS)
    .description('Quiet period after a configuration file change before reloading'),

  // ====================================
  // ALERTING CONFIGURATION
  // ====================================
  DELIVERY_TIMEOUT_MS: Joi.number()
    .integer()
    .min(DELIVERY_TIMEOUT_MIN_MS)
    .max(DELIVERY_TIMEOUT_MAX_MS)
    .default(DELIVERY_TIMEOUT_DEFAULT_MS)
    .description('Time allowed for one channel to deliver one alert (milliseconds)'),

  ALERT_MAX_ATTEMPTS: Joi.number()
    .integer()
    .min(1)
    .max(10)
    .default(3)
    .description('Maximum number of attempts for failed alert deliveries'),

  ALERT_BACKOFF_MS: Joi.number()
    .integer()
    .min(ALERT_BACKOFF_MIN_MS)
    .max(ALERT_BACKOFF_MAX_MS)
    .default(ALERT_BACKOFF_DEFAULT_MS)
    .description('Initial backoff delay for alert retries (milliseconds)'),

  ALERT_MAX_BACKOFF_MS: Joi.number()
    .integer()
    .min(ALERT_MAX_BACKOFF_MIN_MS)
    .max(ALERT_MAX_BACKOFF_MAX_MS)
    .default(ALERT_MAX_BACKOFF_DEFAULT_MS)
    .description('Maximum backoff delay for alert retries (milliseconds)'),

  // ====================================
  // HEALTH CHECK CONFIGURATION
  // ====================================
  ENABLE_HEALTH_CHECK: Joi.boolean()
    .default(false)
    .description('Enable HTTP health check server'),

  HEALTH_CHECK_PORT: Joi.number()
    .integer()
    .min(1024)
    .max(65535)
    .default(3000)
    .description('Port for health check server'),

}).required();


/**
 * Environment variable validation result
 */
interface ValidationResult {
  isValid: boolean;
  config?: DaemonSettings;
  errors?: string[];
  warnings?: string[];
}

/**
 * Validated and typed daemon settings
 */
export interface DaemonSettings {
  nodeEnv: string;
  paths: {
    configPath: string;
    statePath: string;
  };
  monitoring: {
    pollIntervalMs: number;
    maxBatchBytes: number;
    enableFileWatch: boolean;
    configReloadDebounceMs: number;
  };
  alerting: {
    deliveryTimeoutMs: number;
    retryPolicy: AlertRetryPolicy;
  };
  healthCheck: {
    enabled: boolean;
    port: number;
  };
}

/**
 * DaemonConfig class with Joi validation of the process environment
 */
export class DaemonConfig {
  private constructor(private readonly settings: DaemonSettings) {}

  /**
   * Validates environment variables and creates a DaemonConfig instance
   *
   * @throws {Error} When validation fails with detailed error messages
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): DaemonConfig {
    const result = this.validateEnvironment(env);

    if (!result.isValid || !result.config) {
      const errorMessage = [
        '❌ Environment variable validation failed:',
        '',
        ...(result.errors || []).map(error => `  • ${error}`),
        '',
        '💡 Check your .env file and ensure all variables are properly set.',
      ].join('\n');

      throw new Error(errorMessage);
    }

    if (result.warnings && result.warnings.length > 0) {
      console.log('⚠️  Configuration warnings:');
      result.warnings.forEach(warning => console.log(`  • ${warning}`));
      console.log('');
    }

    console.log('✅ Environment configuration validated successfully');
    console.log(`📋 Monitor configuration: ${result.config.paths.configPath}`);
    console.log(`💾 Offset state: ${result.config.paths.statePath}`);
    console.log('');

    return new DaemonConfig(result.config);
  }

  /**
   * Validates environment variables using Joi schema
   */
  private static validateEnvironment(env: NodeJS.ProcessEnv): ValidationResult {
    const { error, value } = environmentSchema.validate(env, {
      allowUnknown: true,
      stripUnknown: false,
      abortEarly: false,
      convert: true
    });

    if (error || !value) {
      return {
        isValid: false,
        errors: (error?.details ?? []).map(detail => {
          const field = detail.path.join('.');
          const message = detail.message;
          return `${field}: ${message}`;
        })
      };
    }

    const config: DaemonSettings = {
      nodeEnv: value.NODE_ENV,
      paths: {
        configPath: value.MONITOR_CONFIG_PATH,
        statePath: value.MONITOR_STATE_PATH,
      },
      monitoring: {
        pollIntervalMs: value.POLL_INTERVAL_MS,
        maxBatchBytes: value.MAX_BATCH_BYTES,
        enableFileWatch: value.ENABLE_FILE_WATCH,
        configReloadDebounceMs: value.CONFIG_RELOAD_DEBOUNCE_MS,
      },
      alerting: {
        deliveryTimeoutMs: value.DELIVERY_TIMEOUT_MS,
        retryPolicy: {
          maxAttempts: value.ALERT_MAX_ATTEMPTS,
          backoffMs: value.ALERT_BACKOFF_MS,
          maxBackoffMs: value.ALERT_MAX_BACKOFF_MS,
        },
      },
      healthCheck: {
        enabled: value.ENABLE_HEALTH_CHECK,
        port: value.HEALTH_CHECK_PORT,
      },
    };

    const warnings: string[] = [];

    if (config.alerting.retryPolicy.backoffMs > config.alerting.retryPolicy.maxBackoffMs) {
      warnings.push('ALERT_BACKOFF_MS exceeds ALERT_MAX_BACKOFF_MS - retries will wait ALERT_MAX_BACKOFF_MS');
    }

    if (config.paths.configPath === config.paths.statePath) {
      warnings.push('MONITOR_CONFIG_PATH and MONITOR_STATE_PATH point to the same file');
    }

    return {
      isValid: true,
      config,
      warnings: warnings.length > 0 ? warnings : undefined
    };
  }

  getNodeEnv() {
    return this.settings.nodeEnv;
  }

  getPaths() {
    return this.settings.paths;
  }

  getMonitoringConfig() {
    return this.settings.monitoring;
  }

  getAlertingConfig() {
    return this.settings.alerting;
  }

  getHealthCheckConfig() {
    return this.settings.healthCheck;
  }
}
