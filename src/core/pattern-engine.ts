import {
  ChannelId,
  CompiledPattern,
  MatchType,
  PatternClause,
  PatternMatch,
  Severity,
} from '../common/interfaces/monitor.interfaces';
import { ConfigInvalidError, errorMessage } from '../common/errors';

/** Single-line evaluation */
export const DEFAULT_CONTEXT_WINDOW = 1;
export const MAX_CONTEXT_WINDOW = 100;

export interface ClauseDefinition {
  regex: string;
  negate: boolean;
}

/**
 * Pattern as described by a validated configuration, before compilation
 */
export interface PatternDefinition {
  name: string;
  clauses: ClauseDefinition[];
  matchType: MatchType;
  severity: Severity;
  alertMethods: ChannelId[];
  contextWindow: number | null;
}

/**
 * Splits the `regex` field of a configured pattern into clauses.
 *
 * A string is one clause for ANY patterns and a comma-separated list for ALL
 * patterns. String clauses are taken as written; only `{ regex, negate: true }`
 * items are negated.
 */
export function parseClauses(
  regex: string | Array<string | { regex: string; negate?: boolean }>,
  matchType: MatchType,
): ClauseDefinition[] {
  const items = typeof regex === 'string'
    ? (matchType === 'all' ? regex.split(',') : [regex])
    : regex;

  const clauses: ClauseDefinition[] = [];
  for (const item of items) {
    if (typeof item !== 'string') {
      clauses.push({ regex: item.regex, negate: item.negate ?? false });
      continue;
    }

    const text = matchType === 'all' && typeof regex === 'string' ? item.trim() : item;
    if (!text) continue;

    clauses.push({ regex: text, negate: false });
  }
  return clauses;
}

function compileClause(definition: ClauseDefinition, patternName: string): PatternClause {
  try {
    return Object.freeze({
      source: definition.regex,
      regex: new RegExp(definition.regex, 'i'),
      negate: definition.negate,
    });
  } catch (error) {
    throw new ConfigInvalidError(
      `Pattern "${patternName}" has an invalid regular expression /${definition.regex}/: ${errorMessage(error)}`,
    );
  }
}

/**
 * Compiles a pattern definition into an immutable rule.
 *
 * @throws {ConfigInvalidError} on an empty clause list or a malformed expression
 */
export function compilePattern(definition: PatternDefinition): CompiledPattern {
  if (definition.clauses.length === 0) {
    throw new ConfigInvalidError(`Pattern "${definition.name}" has no clauses`);
  }

  const clauses = definition.clauses.map(clause => compileClause(clause, definition.name));

  return Object.freeze({
    name: definition.name,
    clauses: Object.freeze(clauses),
    matchType: definition.matchType,
    severity: definition.severity,
    alertMethods: Object.freeze([...definition.alertMethods]),
    contextWindow: definition.contextWindow,
  });
}

function isClauseSatisfied(clause: PatternClause, lines: readonly string[]): boolean {
  const matched = lines.some(line => clause.regex.test(line));
  return clause.negate ? !matched : matched;
}

/**
 * Evaluates one pattern against the newest line of a window.
 *
 * Positive clauses are satisfied when any line in the window matches them,
 * negated clauses when none does. With a window wider than one line the newest
 * line must also match one of the positive clauses, so a pattern fires on the
 * line that completes it rather than on every line while it stays in the window.
 */
export function evaluatePattern(
  window: readonly string[],
  pattern: CompiledPattern,
  contextWindow: number = DEFAULT_CONTEXT_WINDOW,
): boolean {
  const size = Math.max(1, pattern.contextWindow ?? contextWindow);
  const lines = window.slice(-size);
  const newest = lines[lines.length - 1];
  if (newest === undefined) return false;

  let verdict: boolean;
  if (pattern.matchType === 'any') {
    verdict = false;
    for (const clause of pattern.clauses) {
      if (isClauseSatisfied(clause, lines)) {
        verdict = true;
        break;
      }
    }
  } else {
    verdict = true;
    for (const clause of pattern.clauses) {
      if (!isClauseSatisfied(clause, lines)) {
        verdict = false;
        break;
      }
    }
  }

  if (!verdict || lines.length === 1) return verdict;

  const positive = pattern.clauses.filter(clause => !clause.negate);
  return positive.length === 0 || positive.some(clause => clause.regex.test(newest));
}

/**
 * Evaluates a line (or a window whose last element is the newest line)
 * against every pattern in configuration order. All matching patterns are
 * reported so one line can raise alerts of different severities.
 *
 * @param input - the line, or trailing lines of the target with the newest last
 * @param patterns - compiled rule table
 * @param contextWindow - window size for patterns that do not set their own
 */
export function evaluate(
  input: string | readonly string[],
  patterns: readonly CompiledPattern[],
  contextWindow: number = DEFAULT_CONTEXT_WINDOW,
): PatternMatch[] {
  const window = typeof input === 'string' ? [input] : input;
  const newest = window[window.length - 1];
  if (newest === undefined) return [];

  const matches: PatternMatch[] = [];
  for (const pattern of patterns) {
    if (evaluatePattern(window, pattern, contextWindow)) {
      matches.push({
        patternName: pattern.name,
        severity: pattern.severity,
        alertMethods: pattern.alertMethods,
        matchedText: newest,
      });
    }
  }
  return matches;
}

/**
 * Number of trailing lines a target must keep for the given rule table
 */
export function requiredHistory(
  patterns: readonly CompiledPattern[],
  contextWindow: number = DEFAULT_CONTEXT_WINDOW,
): number {
  return patterns.reduce(
    (widest, pattern) => Math.max(widest, pattern.contextWindow ?? contextWindow),
    Math.max(1, contextWindow),
  );
}
