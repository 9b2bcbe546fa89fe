/**
 * Type definitions for the log monitoring and alerting daemon
 *
 * These types describe the validated configuration snapshot, compiled patterns,
 * pattern matches, delivery results and the persisted read-offset state shared
 * by every component of the monitoring pipeline.
 */

/**
 * Severity levels a pattern can be classified under
 *
 * - high: requires immediate attention
 * - medium: worth investigating soon
 * - low: informational
 */
export type Severity = 'high' | 'medium' | 'low';

export const SEVERITY_LEVELS: readonly Severity[] = ['high', 'medium', 'low'];

/**
 * How the clauses of a pattern are folded into a single verdict
 */
export type MatchType = 'any' | 'all';

/**
 * Identifiers of the supported notification channels
 */
export type ChannelId = 'console' | 'email' | 'webhook' | 'push';

export const CHANNEL_IDS: readonly ChannelId[] = ['console', 'email', 'webhook', 'push'];

/**
 * JSON value used for payload templates
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A single compiled clause of a pattern
 */
export interface PatternClause {
  /** Expression as written in the configuration */
  readonly source: string;
  /** Case-insensitive expression compiled at configuration load */
  readonly regex: RegExp;
  /** Inverts the clause before the ANY/ALL fold */
  readonly negate: boolean;
}

/**
 * A pattern ready for evaluation. Built once per configuration load.
 */
export interface CompiledPattern {
  readonly name: string;
  /** Never empty */
  readonly clauses: readonly PatternClause[];
  readonly matchType: MatchType;
  readonly severity: Severity;
  /** Explicit channels; empty means "use the severity routing" */
  readonly alertMethods: readonly ChannelId[];
  /** Trailing lines the pattern is evaluated against; null uses the engine default */
  readonly contextWindow: number | null;
}

/**
 * A positive evaluation of a pattern against a line
 */
export interface PatternMatch {
  patternName: string;
  severity: Severity;
  alertMethods: readonly ChannelId[];
  /** The line that completed the match */
  matchedText: string;
}

/**
 * Where and when a match was observed, used when rendering alerts
 */
export interface AlertOrigin {
  /** Log file path or platform log identifier */
  source: string;
  timestamp: Date;
}

/**
 * Severity to channel routing used when a pattern has no explicit alert methods
 */
export type SeverityRouting = Readonly<Record<Severity, readonly ChannelId[]>>;

export interface ConsoleChannelConfig {
  kind: 'console';
  enabled: boolean;
}

export interface EmailChannelConfig {
  kind: 'email';
  enabled: boolean;
  smtpServer: string;
  smtpPort: number;
  smtpUser: string;
  smtpPassword: string;
  fromEmail: string;
  toEmail: string[];
  subject: string;
}

export interface WebhookChannelConfig {
  kind: 'webhook';
  enabled: boolean;
  url: string;
  headers: Record<string, string>;
  /** Payload template; `{{alert_message}}` is substituted in every string */
  payload: JsonValue;
}

export interface PushChannelConfig {
  kind: 'push';
  enabled: boolean;
  apiUrl: string;
  apiKey: string;
  deviceTokens: string[];
  /** Notification template; `{{alert_message}}` is substituted in every string */
  payload: JsonValue;
}

/**
 * Channel settings, one variant per channel kind
 */
export type ChannelConfig =
  | ConsoleChannelConfig
  | EmailChannelConfig
  | WebhookChannelConfig
  | PushChannelConfig;

/**
 * Channel settings keyed by channel identifier
 */
export type ChannelSettings = {
  readonly [K in ChannelId]?: Extract<ChannelConfig, { kind: K }>;
};

/**
 * Validated configuration snapshot
 *
 * Snapshots are never mutated: a reload builds a new one and swaps the
 * reference, so a sweep always sees one consistent rule set.
 */
export interface MonitorConfiguration {
  readonly logFiles: readonly string[];
  /** Evaluated in this order */
  readonly patterns: readonly CompiledPattern[];
  readonly severityLevels: SeverityRouting;
  readonly channels: ChannelSettings;
  readonly loadedAt: Date;
  /** Digest of the source text the snapshot was built from */
  readonly digest: string;
}

/**
 * Persisted read position of one monitored target
 */
export interface OffsetRecord {
  path: string;
  /** Byte offset for files, last record number for platform logs */
  offset: number;
  /** Value used to tell whether the target changed since the last read */
  fingerprint: string | null;
}

/**
 * Outcome of delivering one match through one channel
 */
export interface DeliveryResult {
  channel: ChannelId;
  status: 'delivered' | 'failed' | 'skipped';
  /** Failure or skip reason */
  error?: string;
}

/**
 * Alert retry policy for HTTP-based channels
 */
export interface AlertRetryPolicy {
  /** Maximum number of attempts, including the first */
  maxAttempts: number;
  /** Initial backoff delay (milliseconds) */
  backoffMs: number;
  /** Maximum backoff delay (milliseconds) */
  maxBackoffMs: number;
}

/**
 * Lifecycle states of the monitor loop
 */
export type MonitorState =
  | 'IDLE'
  | 'INITIALIZING'
  | 'RUNNING'
  | 'RELOADING'
  | 'STOPPING'
  | 'STOPPED';

/**
 * Runtime status of one monitored target, exposed via health status
 */
export interface TargetStatus {
  path: string;
  open: boolean;
  offset: number;
  fingerprint: string | null;
  consecutiveFailures: number;
  lastError: string | null;
  lastReadAt: Date | null;
}

/**
 * Counters exposed via the health endpoint
 */
export interface MonitorMetrics {
  sweepsCompleted: number;
  linesProcessed: number;
  matchesDetected: number;
  alertsDelivered: number;
  deliveryFailures: number;
  readErrors: number;
  truncationsDetected: number;
  checkpointsWritten: number;
  reloadsApplied: number;
  reloadsRejected: number;
  lastSweepAt: Date | null;
}

/**
 * Result of one pass over all monitored targets
 */
export interface SweepSummary {
  targets: number;
  linesProcessed: number;
  matches: number;
  checkpoints: number;
}

/**
 * Payload of the `match` event emitted by the monitor
 */
export interface MatchEvent {
  match: PatternMatch;
  origin: AlertOrigin;
  deliveries: DeliveryResult[];
}
