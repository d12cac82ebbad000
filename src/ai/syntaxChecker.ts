import * as cheerio from 'cheerio';
import { describeError } from '../errors';
import type { Artifact, SyntaxCheckMode, SyntaxCheckResult } from '../jobs/types';

const STRUCTURAL_SELECTOR = 'div, section, main, header, footer, article, nav, form, aside, body';

export function stripCssComments(style: string): string {
  return style.replace(/\/\*[\s\S]*?\*\//g, '');
}

export interface DelimiterCounts {
  parens: { open: number; close: number };
  braces: { open: number; close: number };
}

/**
 * Counts `()` and `{}` outside string literals and comments. Template
 * literal interpolations are counted as plain text, and regex literals are
 * not recognised.
 */
export function countDelimiters(source: string): DelimiterCounts {
  const counts: DelimiterCounts = {
    parens: { open: 0, close: 0 },
    braces: { open: 0, close: 0 },
  };

  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    const next = source[i + 1];

    if (ch === '/' && next === '/') {
      const end = source.indexOf('\n', i);
      i = end === -1 ? source.length : end + 1;
      continue;
    }
    if (ch === '/' && next === '*') {
      const end = source.indexOf('*/', i + 2);
      i = end === -1 ? source.length : end + 2;
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      i++;
      while (i < source.length && source[i] !== ch) {
        i += source[i] === '\\' ? 2 : 1;
      }
      i++;
      continue;
    }

    if (ch === '(') counts.parens.open++;
    else if (ch === ')') counts.parens.close++;
    else if (ch === '{') counts.braces.open++;
    else if (ch === '}') counts.braces.close++;
    i++;
  }

  return counts;
}

function checkMarkup(markup: string, errors: string[], warnings: string[]): void {
  if (!markup.trim()) {
    errors.push('Markup is empty');
    return;
  }

  const $ = cheerio.load(markup, null, false);
  const isDocument = /<!doctype|<html[\s>]/i.test(markup);

  if (!isDocument && $(STRUCTURAL_SELECTOR).length === 0) {
    warnings.push('Markup has no structural container element (div, section, main, ...)');
  }
  if (isDocument) {
    warnings.push('Markup is a complete document; only body content is expected');
  }
}

function checkStyle(style: string, mode: SyntaxCheckMode, errors: string[], warnings: string[]): void {
  if (!style.trim()) return;

  const stripped = stripCssComments(style);
  const open = (stripped.match(/\{/g) || []).length;
  const close = (stripped.match(/\}/g) || []).length;

  if (open === 0 && close === 0) {
    warnings.push('Style has no rule blocks');
    return;
  }
  if (open !== close) {
    const message = `Style braces are unbalanced (${open} "{" vs ${close} "}")`;
    if (mode === 'strict') errors.push(message);
    else warnings.push(message);
  }
}

function checkBehavior(behavior: string, mode: SyntaxCheckMode, errors: string[], warnings: string[]): void {
  if (!behavior.trim()) return;

  if (!/function|=>|addEventListener/.test(behavior)) {
    warnings.push('Behavior defines no functions or event listeners');
  }

  const { parens, braces } = countDelimiters(behavior);
  const problems: string[] = [];
  if (parens.open !== parens.close) {
    problems.push(`Behavior parentheses are unbalanced (${parens.open} "(" vs ${parens.close} ")")`);
  }
  if (braces.open !== braces.close) {
    problems.push(`Behavior braces are unbalanced (${braces.open} "{" vs ${braces.close} "}")`);
  }
  for (const message of problems) {
    if (mode === 'strict') errors.push(message);
    else warnings.push(message);
  }
}

/**
 * Cheap local structure check. Never throws: an internal failure is
 * reported as an error entry.
 */
export function checkArtifactSyntax(artifact: Artifact, mode: SyntaxCheckMode = 'loose'): SyntaxCheckResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  try {
    checkMarkup(artifact.markup, errors, warnings);
    checkStyle(artifact.style, mode, errors, warnings);
    checkBehavior(artifact.behavior, mode, errors, warnings);
  } catch (error) {
    errors.push(`Syntax check failed: ${describeError(error)}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
