import Joi from 'joi';
import * as crypto from 'crypto';
import {
  CHANNEL_IDS,
  ChannelId,
  ChannelSettings,
  CompiledPattern,
  JsonValue,
  MatchType,
  MonitorConfiguration,
  SEVERITY_LEVELS,
  Severity,
  SeverityRouting,
} from '../common/interfaces/monitor.interfaces';
import { ConfigInvalidError, errorMessage } from '../common/errors';
import { compilePattern, MAX_CONTEXT_WINDOW, parseClauses } from '../core/pattern-engine';

/**
 * Monitor configuration file, as written on disk
 */
export interface RawPatternConfig {
  name: string;
  regex: string | Array<string | { regex: string; negate?: boolean }>;
  severity: Severity;
  alert_methods: ChannelId[];
  match_type: MatchType;
  context: number | null;
}

export interface RawEmailConfig {
  enabled: boolean;
  smtp_server?: string;
  smtp_port: number;
  smtp_user: string;
  smtp_password: string;
  from_email?: string;
  to_email: string[];
  subject: string;
}

export interface RawWebhookConfig {
  enabled: boolean;
  url?: string;
  headers: Record<string, string>;
  payload: JsonValue;
}

export interface RawPushConfig {
  enabled: boolean;
  api_url?: string;
  api_key: string;
  device_tokens: string[];
  payload: JsonValue;
}

export interface RawMonitorConfig {
  log_files: string[];
  patterns: RawPatternConfig[];
  email?: RawEmailConfig;
  webhook?: RawWebhookConfig;
  push?: RawPushConfig;
  severity_levels: Record<Severity, ChannelId[]>;
}

const DEFAULT_WEBHOOK_PAYLOAD = { message: 'Log monitoring alert! {{alert_message}}' };
const DEFAULT_PUSH_PAYLOAD = { title: 'Log monitoring alert!', body: '{{alert_message}}' };

const channelList = Joi.array()
  .items(Joi.string().lowercase().valid(...CHANNEL_IDS))
  .messages({ 'any.only': '{{#label}} must be one of console, email, webhook, push' });

const clauseSchema = Joi.alternatives().try(
  Joi.string().min(1),
  Joi.object({
    regex: Joi.string().min(1).required(),
    negate: Joi.boolean().default(false),
  }),
);

const patternSchema = Joi.object<RawPatternConfig>({
  name: Joi.string().trim().min(1).required(),
  regex: Joi.alternatives()
    .try(Joi.string().min(1), Joi.array().items(clauseSchema).min(1))
    .required()
    .description('Single expression, comma-separated expressions for ALL, or a list of clauses ({ regex, negate } items negate)'),
  severity: Joi.string()
    .lowercase()
    .valid(...SEVERITY_LEVELS)
    .required()
    .messages({ 'any.only': '{{#label}} must be one of high, medium, low' }),
  alert_methods: channelList.default([]),
  match_type: Joi.string().lowercase().valid('any', 'all').default('any'),
  context: Joi.number().integer().min(1).max(MAX_CONTEXT_WINDOW).allow(null).default(null)
    .description('Trailing lines evaluated with each new line'),
});

const requiredWhenEnabled = { is: true, then: Joi.required() };

const emailSchema = Joi.object<RawEmailConfig>({
  enabled: Joi.boolean().default(false),
  smtp_server: Joi.string().hostname().when('enabled', requiredWhenEnabled),
  smtp_port: Joi.number().integer().min(1).max(65535).default(587),
  smtp_user: Joi.string().allow('').default(''),
  smtp_password: Joi.string().allow('').default(''),
  from_email: Joi.string().email({ tlds: { allow: false } }).when('enabled', requiredWhenEnabled),
  to_email: Joi.array()
    .items(Joi.string().email({ tlds: { allow: false } }))
    .single()
    .default([])
    .when('enabled', { is: true, then: Joi.array().min(1) }),
  subject: Joi.string().default('Log Monitoring Alert'),
}).unknown(true);

const webhookSchema = Joi.object<RawWebhookConfig>({
  enabled: Joi.boolean().default(false),
  url: Joi.string().uri({ scheme: ['http', 'https'] }).when('enabled', requiredWhenEnabled),
  headers: Joi.object().pattern(Joi.string(), Joi.string()).default({}),
  payload: Joi.any().default(DEFAULT_WEBHOOK_PAYLOAD),
}).unknown(true);

const pushSchema = Joi.object<RawPushConfig>({
  enabled: Joi.boolean().default(false),
  api_url: Joi.string().uri({ scheme: ['http', 'https'] }).when('enabled', requiredWhenEnabled),
  api_key: Joi.string().allow('').default(''),
  device_tokens: Joi.array()
    .items(Joi.string().min(1))
    .default([])
    .when('enabled', { is: true, then: Joi.array().min(1) }),
  payload: Joi.any().default(DEFAULT_PUSH_PAYLOAD),
}).unknown(true);

/**
 * Validation schema for the monitor configuration file
 */
const monitorConfigSchema = Joi.object<RawMonitorConfig>({
  log_files: Joi.array().items(Joi.string().trim().min(1)).unique().default([])
    .description('Log file paths or eventlog:<name> identifiers'),
  patterns: Joi.array().items(patternSchema).unique('name').default([])
    .messages({ 'array.unique': '{{#label}} duplicates the name of another pattern' }),
  email: emailSchema.optional(),
  webhook: webhookSchema.optional(),
  push: pushSchema.optional(),
  severity_levels: Joi.object({
    high: channelList.default([]),
    medium: channelList.default([]),
    low: channelList.default([]),
  }).default({ high: [], medium: [], low: [] }),
}).unknown(true).required();

export interface ParsedMonitorConfig {
  config: MonitorConfiguration;
  warnings: string[];
}

/**
 * Parses and validates the text of a monitor configuration file and compiles
 * it into an immutable snapshot.
 *
 * @throws {ConfigInvalidError} listing every problem found
 */
export function parseMonitorConfig(text: string): ParsedMonitorConfig {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new ConfigInvalidError(`Configuration is not valid JSON: ${errorMessage(error)}`, [errorMessage(error)]);
  }

  return buildMonitorConfig(document, digestOf(text));
}

/**
 * Validates an already-parsed configuration document
 *
 * @throws {ConfigInvalidError}
 */
export function buildMonitorConfig(document: unknown, digest: string = digestOf(JSON.stringify(document))): ParsedMonitorConfig {
  const { error, value } = monitorConfigSchema.validate(document, {
    abortEarly: false,
    convert: true,
  });

  if (error || !value) {
    const problems = error
      ? error.details.map(detail => `${detail.path.join('.') || 'config'}: ${detail.message}`)
      : ['configuration is empty'];
    throw new ConfigInvalidError(`Configuration validation failed:\n  • ${problems.join('\n  • ')}`, problems);
  }

  const problems: string[] = [];
  const patterns: CompiledPattern[] = [];
  value.patterns.forEach((raw, index) => {
    try {
      patterns.push(compilePattern({
        name: raw.name,
        clauses: parseClauses(raw.regex, raw.match_type),
        matchType: raw.match_type,
        severity: raw.severity,
        alertMethods: raw.alert_methods,
        contextWindow: raw.context,
      }));
    } catch (compileError) {
      problems.push(`patterns.${index}.regex: ${errorMessage(compileError)}`);
    }
  });

  if (problems.length > 0) {
    throw new ConfigInvalidError(`Configuration validation failed:\n  • ${problems.join('\n  • ')}`, problems);
  }

  const channels = toChannelSettings(value);
  const severityLevels: SeverityRouting = Object.freeze({
    high: Object.freeze(dedupe(value.severity_levels.high)),
    medium: Object.freeze(dedupe(value.severity_levels.medium)),
    low: Object.freeze(dedupe(value.severity_levels.low)),
  });

  const config: MonitorConfiguration = Object.freeze({
    logFiles: Object.freeze([...value.log_files]),
    patterns: Object.freeze(patterns),
    severityLevels,
    channels,
    loadedAt: new Date(),
    digest,
  });

  return { config, warnings: collectWarnings(config) };
}

/**
 * Stable digest of configuration source text
 */
export function digestOf(text: string): string {
  return crypto.createHash('sha256').update(text).digest('hex');
}

function dedupe<T>(items: readonly T[]): T[] {
  return Array.from(new Set(items));
}

function toChannelSettings(raw: RawMonitorConfig): ChannelSettings {
  const settings: ChannelSettings = {
    console: { kind: 'console', enabled: true },
    email: raw.email && {
      kind: 'email',
      enabled: raw.email.enabled,
      smtpServer: raw.email.smtp_server ?? '',
      smtpPort: raw.email.smtp_port,
      smtpUser: raw.email.smtp_user,
      smtpPassword: raw.email.smtp_password,
      fromEmail: raw.email.from_email ?? '',
      toEmail: raw.email.to_email,
      subject: raw.email.subject,
    },
    webhook: raw.webhook && {
      kind: 'webhook',
      enabled: raw.webhook.enabled,
      url: raw.webhook.url ?? '',
      headers: raw.webhook.headers,
      payload: raw.webhook.payload,
    },
    push: raw.push && {
      kind: 'push',
      enabled: raw.push.enabled,
      apiUrl: raw.push.api_url ?? '',
      apiKey: raw.push.api_key,
      deviceTokens: raw.push.device_tokens,
      payload: raw.push.payload,
    },
  };
  return Object.freeze(settings);
}

/**
 * Problems that do not block the configuration but deserve attention
 */
function collectWarnings(config: MonitorConfiguration): string[] {
  const warnings: string[] = [];

  if (config.logFiles.length === 0) {
    warnings.push('No log files configured - nothing will be monitored');
  }
  if (config.patterns.length === 0) {
    warnings.push('No patterns configured - no alerts will be raised');
  }

  const referenced = new Set<ChannelId>();
  for (const severity of SEVERITY_LEVELS) {
    config.severityLevels[severity].forEach(channel => referenced.add(channel));
  }
  for (const pattern of config.patterns) {
    pattern.alertMethods.forEach(channel => referenced.add(channel));
    if (pattern.alertMethods.length === 0 && config.severityLevels[pattern.severity].length === 0) {
      warnings.push(`Pattern "${pattern.name}" has no alert methods and severity "${pattern.severity}" routes nowhere`);
    }
  }

  for (const channel of referenced) {
    const settings = config.channels[channel];
    if (!settings || !settings.enabled) {
      warnings.push(`Channel "${channel}" is referenced but not enabled - its alerts will be skipped`);
    }
  }

  return warnings;
}
