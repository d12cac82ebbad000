/**
 * Requirement Profile - Rule-Based Page Classification
 *
 * Derives page type, visual style and interaction hints from the raw
 * requirement text. Deterministic keyword matching only, no LLM calls.
 */

import { z } from 'zod';
import { createLogger } from '../logger';
import type { PageType, RequirementProfile, VisualStyle } from '../jobs/types';
import keywordData from './requirementKeywords.json';

const log = createLogger('profile');

const keywordList = z.array(z.string().min(1));

const keywordTableSchema = z.object({
  types: z.object({
    form: keywordList,
    dashboard: keywordList,
    ecommerce: keywordList,
    blog: keywordList,
    navigation: keywordList,
    landing: keywordList,
    game: keywordList,
  }),
  styles: z.object({
    minimal: keywordList,
    business: keywordList,
    creative: keywordList,
    playful: keywordList,
  }),
  interactive: keywordList,
  desktopOnly: keywordList,
});

const keywords = keywordTableSchema.parse(keywordData);

const TYPE_ORDER: Exclude<PageType, 'unknown'>[] = [
  'form',
  'dashboard',
  'ecommerce',
  'blog',
  'navigation',
  'landing',
  'game',
];

const STYLE_ORDER: Exclude<VisualStyle, 'modern'>[] = ['minimal', 'business', 'creative', 'playful'];

// ASCII keywords match on word boundaries; CJK keywords by substring
function containsKeyword(normalized: string, keyword: string): boolean {
  if (/^[\x20-\x7e]+$/.test(keyword)) {
    const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`\\b${escaped}\\b`).test(normalized);
  }
  return normalized.includes(keyword);
}

function matchAll(normalized: string, list: string[]): string[] {
  return list.filter((keyword) => containsKeyword(normalized, keyword));
}

/**
 * The type with the most matched keywords wins; ties go to the earlier
 * entry of TYPE_ORDER. Style defaults to "modern" and responsive to true.
 */
export function classifyRequirements(requirements: string): RequirementProfile {
  const normalized = requirements.toLowerCase();
  const features: string[] = [];

  let type: PageType = 'unknown';
  let bestCount = 0;
  for (const candidate of TYPE_ORDER) {
    const matched = matchAll(normalized, keywords.types[candidate]);
    features.push(...matched);
    if (matched.length > bestCount) {
      bestCount = matched.length;
      type = candidate;
    }
  }

  let style: VisualStyle = 'modern';
  for (const candidate of STYLE_ORDER) {
    if (matchAll(normalized, keywords.styles[candidate]).length > 0) {
      style = candidate;
      break;
    }
  }

  const interactiveMatches = matchAll(normalized, keywords.interactive);
  features.push(...interactiveMatches);

  const profile: RequirementProfile = {
    type,
    style,
    interactive: interactiveMatches.length > 0,
    responsive: matchAll(normalized, keywords.desktopOnly).length === 0,
    features: Array.from(new Set(features)),
  };

  log.debug(`type=${profile.type} style=${profile.style} interactive=${profile.interactive}`);
  return profile;
}
