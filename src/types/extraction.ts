/**
 * Extraction strategy types
 * A matcher pulls one raw value out of a payload; a field plan lists the
 * matchers for each field in order of preference.
 */

export type FieldType = 'number' | 'string';

interface MatcherBase {
  /** Reported as `strategyUsed` when this matcher wins */
  name: string;
}

/** First capture group of the pattern is the value */
export interface RegexMatcher extends MatcherBase {
  kind: 'regex';
  pattern: RegExp;
}

/** Text (or attribute) of the first element matching the selector */
export interface SelectorMatcher extends MatcherBase {
  kind: 'selector';
  selector: string;
  attribute?: string;
}

/** Dotted path into a parsed JSON payload, e.g. `about.stats.users_count` */
export interface JsonPathMatcher extends MatcherBase {
  kind: 'jsonPath';
  path: string;
}

export type Matcher = RegexMatcher | SelectorMatcher | JsonPathMatcher;

export interface ExtractionResult {
  succeeded: boolean;
  value?: number | string;
  strategyUsed: string;
}

export interface FieldRule<F extends string> {
  field: F;
  matchers: readonly Matcher[];
}

/**
 * Numeric fields to extract from one payload, each independently
 */
export type FieldPlan<F extends string> = readonly FieldRule<F>[];
