// GIVEN/WHEN/THEN extraction from free-text descriptions

import { TDD_SECTIONS, type TddSection } from '../../models/types.js';
import type { TddSections } from '../../models/generation.js';

const KEYWORD_SPLIT = /\b(GIVEN|WHEN|THEN)\b/i;
const FRAGMENT_EDGES = /^[ :.-]+|[ :.-]+$/g;

function toSection(keyword: string): TddSection | undefined {
  const upper = keyword.toUpperCase();
  return TDD_SECTIONS.find(section => section === upper);
}

/**
 * Splits a description into GIVEN/WHEN/THEN fragments.
 *
 * A keyword repeated later in the text replaces the earlier fragment, unless
 * the later fragment is empty. Text before the first keyword is ignored.
 */
export function parseTddSections(description: string): TddSections {
  // split() with a capture group interleaves the keywords: [pre, kw, text, kw, text, ...]
  const parts = description.split(KEYWORD_SPLIT);
  const sections: TddSections = {};

  for (let i = 1; i + 1 < parts.length; i += 2) {
    const section = toSection(parts[i]);
    const fragment = parts[i + 1].trim().replace(FRAGMENT_EDGES, '');
    if (section && fragment) {
      sections[section] = fragment;
    }
  }

  return sections;
}

/**
 * Sections absent from the mapping, in GIVEN, WHEN, THEN order
 */
export function missingSections(sections: TddSections): TddSection[] {
  return TDD_SECTIONS.filter(section => sections[section] === undefined);
}
