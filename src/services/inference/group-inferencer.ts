// Group inference from description text

import { VALID_GROUPS, type Group } from '../../models/types.js';

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Returns the first group, in vocabulary order, that the text mentions as a
 * whole word. Vocabulary order decides ties, not position in the text.
 */
export function inferGroup(description: string): Group | undefined {
  return VALID_GROUPS.find(group =>
    new RegExp(`\\b${escapeRegExp(group)}\\b`, 'i').test(description)
  );
}
