import type { Cheerio } from 'cheerio';
import { isDocument, isTag, isText, type AnyNode, type Element } from 'domhandler';
import type { SelectorStrategy } from './selectors';

export type NoMatchReason = 'not_found' | 'rejected' | 'invalid_selector';

export type StrategyOutcome =
  | { kind: 'match'; strategyId: string; value: string }
  | { kind: 'no_match'; strategyId: string; reason: NoMatchReason };

const NON_TEXT_ELEMENTS = new Set(['script', 'style', 'template']);

/**
 * Text of a node: every descendant text node trimmed, empty ones dropped,
 * joined with `separator`. Script and style contents are not text.
 */
export function collectText(node: AnyNode, separator = ' '): string {
  const pieces: string[] = [];

  const visit = (current: AnyNode): void => {
    if (isText(current)) {
      const text = current.data.trim();
      if (text) pieces.push(text);
    } else if (isDocument(current) || (isTag(current) && !NON_TEXT_ELEMENTS.has(current.name))) {
      current.children.forEach(visit);
    }
  };

  visit(node);
  return pieces.join(separator);
}

function select<T extends AnyNode>(scope: Cheerio<T>, selector: string): Element[] | null {
  try {
    return scope.find(selector).toArray();
  } catch {
    // css-what rejects the selector before any matching happens
    return null;
  }
}

export function attemptStrategy<T extends AnyNode>(
  fragment: Cheerio<T>,
  strategy: SelectorStrategy
): StrategyOutcome {
  const noMatch = (reason: NoMatchReason): StrategyOutcome => ({
    kind: 'no_match',
    strategyId: strategy.id,
    reason,
  });

  const matches = select(fragment, strategy.selector);
  if (matches === null) return noMatch('invalid_selector');
  if (matches.length === 0) return noMatch('not_found');

  let candidates: Element[] = strategy.scope === 'first' ? matches.slice(0, 1) : matches;

  if (strategy.within) {
    const nested = select(fragment.find(strategy.selector).first(), strategy.within);
    if (nested === null) return noMatch('invalid_selector');
    if (nested.length === 0) return noMatch('not_found');
    candidates = strategy.scope === 'first' ? nested.slice(0, 1) : nested;
  }

  for (const candidate of candidates) {
    const value = collectText(candidate);
    if (strategy.accept(value)) {
      return { kind: 'match', strategyId: strategy.id, value };
    }
  }

  return noMatch('rejected');
}

/**
 * Evaluate strategies in order and return the first accepted match,
 * together with every outcome that was produced on the way.
 */
export function firstAcceptedMatch<T extends AnyNode>(
  fragment: Cheerio<T>,
  strategies: readonly SelectorStrategy[]
): { match: Extract<StrategyOutcome, { kind: 'match' }> | null; attempts: StrategyOutcome[] } {
  const attempts: StrategyOutcome[] = [];

  for (const strategy of strategies) {
    const outcome = attemptStrategy(fragment, strategy);
    attempts.push(outcome);
    if (outcome.kind === 'match') {
      return { match: outcome, attempts };
    }
  }

  return { match: null, attempts };
}
