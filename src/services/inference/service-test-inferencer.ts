// Service and test name inference from a description's summary clause

import type { Group } from '../../models/types.js';
import { escapeRegExp } from './group-inferencer.js';
import { slugify } from './slug.js';

/**
 * Service and test names derived so far; unset fields are unresolved
 */
export interface InferredNames {
  service?: string;
  test?: string;
}

/**
 * One step of the inference cascade. A rule returns the names it can derive
 * from the summary, or undefined when it does not apply or does not match.
 */
export interface InferenceRule {
  name: string;
  infer(summary: string, resolved: Readonly<InferredNames>, group?: Group): InferredNames | undefined;
}

const WORD = '[a-z0-9][a-z0-9_/-]+';
const WORDS = '[a-z0-9][a-z0-9_/ -]+';

const EXPLICIT_OBJECT = new RegExp(
  `\\bfor\\s+([a-z0-9][a-z0-9_/ -]+?)\\s+(?:check|test|validation|integration|script)\\b`,
  'i'
);
const BARE_FOR = new RegExp(`\\bfor\\s+(${WORD})`, 'i');
// "check for X" is the explicit-object phrasing, not a verb with an object
const VERB_OBJECT = new RegExp(`\\b(?:ensure|verify|validate|confirm|check)\\s+(?!for\\b)(${WORDS})`, 'i');

function toSlug(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const slug = slugify(value);
  return slug || undefined;
}

/**
 * "... for redis authentication check ..."
 */
export const explicitObjectRule: InferenceRule = {
  name: 'explicit-object',
  infer(summary) {
    const match = EXPLICIT_OBJECT.exec(summary);
    if (!match) return undefined;

    const words = match[1].trim().split(/\s+/);
    return {
      service: toSlug(words[0]),
      test: words.length > 1 ? toSlug(words.slice(1).join(' ')) : undefined
    };
  }
};

/**
 * "... security redis authentication ..." once the group is known
 */
export const groupPrefixedRule: InferenceRule = {
  name: 'group-prefixed',
  infer(summary, resolved, group) {
    if (resolved.service || !group) return undefined;

    const pattern = new RegExp(`\\b${escapeRegExp(group)}\\s+(${WORD})(?:\\s+(${WORD}))?`, 'i');
    const match = pattern.exec(summary);
    if (!match) return undefined;

    return { service: toSlug(match[1]), test: toSlug(match[2]) };
  }
};

/**
 * First word after a standalone "for"
 */
export const bareForRule: InferenceRule = {
  name: 'bare-for',
  infer(summary, resolved) {
    if (resolved.service) return undefined;

    const match = BARE_FOR.exec(summary);
    return match ? { service: toSlug(match[1]) } : undefined;
  }
};

/**
 * "ensure|verify|validate|confirm|check <words>"
 */
export const verbGuidedRule: InferenceRule = {
  name: 'verb-guided',
  infer(summary, resolved) {
    if (resolved.test) return undefined;

    const match = VERB_OBJECT.exec(summary);
    return match ? { test: toSlug(match[1]) } : undefined;
  }
};

/**
 * The word right after the service token, when it is not the service again
 */
export const adjacencyRule: InferenceRule = {
  name: 'adjacency',
  infer(summary, resolved) {
    const { service } = resolved;
    if (!service || resolved.test) return undefined;

    const pattern = new RegExp(`\\b${escapeRegExp(service)}\\b\\s+(${WORD})`, 'i');
    const match = pattern.exec(summary);
    if (!match) return undefined;

    const candidate = toSlug(match[1]);
    return candidate && candidate !== service ? { test: candidate } : undefined;
  }
};

export const INFERENCE_RULES: readonly InferenceRule[] = [
  explicitObjectRule,
  groupPrefixedRule,
  bareForRule,
  verbGuidedRule,
  adjacencyRule
];

/**
 * Text before the first "Given", then before the first "GIVEN". The TDD
 * fragments are never mined for names.
 */
export function extractSummary(description: string): string {
  return description.split('Given')[0].split('GIVEN')[0];
}

/**
 * Runs the rules in order; each field keeps the first value a rule produces.
 */
export function inferServiceAndTest(
  description: string,
  group?: Group,
  rules: readonly InferenceRule[] = INFERENCE_RULES
): InferredNames {
  const summary = extractSummary(description);

  return rules.reduce<InferredNames>((resolved, rule) => {
    const candidate = rule.infer(summary, resolved, group);
    if (!candidate) return resolved;
    return {
      service: resolved.service ?? candidate.service,
      test: resolved.test ?? candidate.test
    };
  }, {});
}
