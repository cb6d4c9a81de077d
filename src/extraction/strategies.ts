import { type CheerioAPI, load as loadHtml } from 'cheerio';
import type {
  ExtractionResult,
  FieldPlan,
  FieldType,
  Matcher
} from '../types/extraction';
import { parseMetricNumber } from './numbers';

const NO_MATCH: ExtractionResult = { succeeded: false, strategyUsed: 'none' };

/**
 * A fetched text page. The cheerio document is built on first use and then
 * shared by every selector matcher run against the page.
 */
export class TextPage {
  private document?: CheerioAPI;

  constructor(
    readonly text: string,
    readonly url?: string
  ) {}

  get $(): CheerioAPI {
    if (!this.document) {
      this.document = loadHtml(this.text);
    }
    return this.document;
  }
}

/**
 * A TextPage for regex and selector matchers; anything else is treated as a
 * parsed JSON value for jsonPath matchers.
 */
export type ExtractionPayload = unknown;

function readJsonPath(value: unknown, path: string): unknown {
  let current: unknown = value;
  for (const segment of path.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
      continue;
    }
    if (typeof current !== 'object' || current === null || !(segment in current)) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

/**
 * Raw value a single matcher yields, or undefined on a miss
 */
function applyMatcher(payload: ExtractionPayload, matcher: Matcher): string | number | undefined {
  switch (matcher.kind) {
    case 'regex': {
      if (!(payload instanceof TextPage)) {
        return undefined;
      }
      const pattern = new RegExp(matcher.pattern.source, matcher.pattern.flags.replace('g', ''));
      const match = pattern.exec(payload.text);
      return match?.[1];
    }
    case 'selector': {
      if (!(payload instanceof TextPage)) {
        return undefined;
      }
      const element = payload.$(matcher.selector).first();
      if (element.length === 0) {
        return undefined;
      }
      return matcher.attribute ? element.attr(matcher.attribute) : element.text();
    }
    case 'jsonPath': {
      if (payload instanceof TextPage) {
        return undefined;
      }
      const found = readJsonPath(payload, matcher.path);
      return typeof found === 'string' || typeof found === 'number' ? found : undefined;
    }
  }
}

function convert(raw: string | number, type: FieldType): number | string | undefined {
  if (type === 'number') {
    return parseMetricNumber(raw);
  }
  const text = String(raw).replace(/\s+/g, ' ').trim();
  return text.length > 0 ? text : undefined;
}

/**
 * Run matchers in order; the first one whose value converts to the target
 * type wins. A miss on every matcher is a normal result, not an error.
 */
export function extractField(
  payload: ExtractionPayload,
  matchers: readonly Matcher[],
  type: FieldType = 'number'
): ExtractionResult {
  for (const matcher of matchers) {
    const raw = applyMatcher(payload, matcher);
    if (raw === undefined) {
      continue;
    }
    const value = convert(raw, type);
    if (value !== undefined) {
      return { succeeded: true, value, strategyUsed: matcher.name };
    }
  }
  return NO_MATCH;
}

export interface FieldExtraction<F extends string> {
  values: Partial<Record<F, number>>;
  results: Partial<Record<F, ExtractionResult>>;
  attempted: number;
  extracted: number;
}

/**
 * Extract every numeric field of a plan independently
 */
export function extractFields<F extends string>(
  payload: ExtractionPayload,
  plan: FieldPlan<F>
): FieldExtraction<F> {
  const values: Partial<Record<F, number>> = {};
  const results: Partial<Record<F, ExtractionResult>> = {};
  let extracted = 0;

  for (const { field, matchers } of plan) {
    const result = extractField(payload, matchers, 'number');
    results[field] = result;
    if (result.succeeded && typeof result.value === 'number') {
      values[field] = result.value;
      extracted++;
    }
  }

  return { values, results, attempted: plan.length, extracted };
}
