import { REVERSE_ZONES, type AddressFamily } from './address-normalizer.js';
import { normalizeSuffix } from './config.js';
import { QTYPE } from './dns-protocol.js';
import type { Query } from './types.js';

export type RouteHandler =
  | 'localhost-a'
  | 'localhost-aaaa'
  | 'local-a'
  | 'local-aaaa'
  | 'local-cname'
  | 'local-mx'
  | 'ptr-ipv4'
  | 'ptr-ipv6'
  | 'forward';

/** Structured name predicates; no regular expressions, so no escaping of the suffix. */
export type NameMatcher =
  | { kind: 'exact'; name: string }
  | { kind: 'suffix'; suffix: string }
  | { kind: 'reverse'; family: AddressFamily }
  | { kind: 'any' };

export interface RoutingRule {
  readonly handler: RouteHandler;
  readonly matcher: NameMatcher;
  /** QTYPE the rule applies to; absent means any type */
  readonly qtype?: number;
}

export type Capture =
  | { kind: 'none' }
  | { kind: 'label'; label: string }
  | { kind: 'reverse'; family: AddressFamily; labels: string[] };

export interface RouteMatch {
  rule: RoutingRule;
  capture: Capture;
}

const CATCH_ALL: RoutingRule = { handler: 'forward', matcher: { kind: 'any' } };

export function normalizeQueryName(name: string): string {
  return name.toLowerCase().replace(/\.$/, '');
}

/**
 * Returns the part of `name` in front of `.<zone>`, or null when `name` is not
 * strictly below `zone`.
 */
function stripZone(name: string, zone: string): string | null {
  const tail = `.${zone}`;
  if (name.length <= tail.length || !name.endsWith(tail)) return null;
  return name.slice(0, -tail.length);
}

export function matchName(matcher: NameMatcher, name: string): Capture | null {
  switch (matcher.kind) {
    case 'exact':
      return name === matcher.name ? { kind: 'none' } : null;
    case 'suffix': {
      const label = stripZone(name, matcher.suffix);
      return label === null ? null : { kind: 'label', label };
    }
    case 'reverse': {
      const prefix = stripZone(name, REVERSE_ZONES[matcher.family]);
      return prefix === null ? null : { kind: 'reverse', family: matcher.family, labels: prefix.split('.') };
    }
    case 'any':
      return { kind: 'none' };
  }
}

/** The rule table, in evaluation order. The catch-all is always last. */
export function buildRoutingRules(suffix: string): readonly RoutingRule[] {
  const zone: NameMatcher = { kind: 'suffix', suffix: normalizeSuffix(suffix) };
  const localhost: NameMatcher = { kind: 'exact', name: 'localhost' };

  const rules: RoutingRule[] = [
    { handler: 'localhost-a', matcher: localhost, qtype: QTYPE.A },
    { handler: 'localhost-aaaa', matcher: localhost, qtype: QTYPE.AAAA },
    { handler: 'local-a', matcher: zone, qtype: QTYPE.A },
    { handler: 'local-aaaa', matcher: zone, qtype: QTYPE.AAAA },
    { handler: 'local-cname', matcher: zone, qtype: QTYPE.CNAME },
    { handler: 'local-mx', matcher: zone, qtype: QTYPE.MX },
    { handler: 'ptr-ipv4', matcher: { kind: 'reverse', family: 'ipv4' }, qtype: QTYPE.PTR },
    { handler: 'ptr-ipv6', matcher: { kind: 'reverse', family: 'ipv6' }, qtype: QTYPE.PTR },
    CATCH_ALL,
  ];
  return Object.freeze(rules.map((rule) => Object.freeze(rule)));
}

export class QueryRouter {
  private readonly rules: readonly RoutingRule[];

  constructor(suffix: string) {
    this.rules = buildRoutingRules(suffix);
  }

  getRules(): readonly RoutingRule[] {
    return this.rules;
  }

  /** First matching rule wins; every query matches at least the catch-all. */
  route(query: Query): RouteMatch {
    const name = normalizeQueryName(query.name);
    for (const rule of this.rules) {
      if (rule.qtype !== undefined && rule.qtype !== query.type) continue;
      const capture = matchName(rule.matcher, name);
      if (capture) {
        return { rule, capture };
      }
    }
    return { rule: CATCH_ALL, capture: { kind: 'none' } };
  }
}
