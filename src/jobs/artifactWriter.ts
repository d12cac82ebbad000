/**
 * Artifact Writer
 *
 * Composes an artifact into one self-contained HTML document and writes it
 * to the preview directory under a name that is never reused.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FinalizationError, ResourceError, describeError } from '../errors';
import { Artifact } from './types';

const TITLE_LIMIT = 60;

const DOCUMENT_PATTERN =
  /^<!DOCTYPE html>\n<html lang="en">\n<head>\n<meta charset="UTF-8">\n<meta name="viewport" content="width=device-width, initial-scale=1\.0">\n<title>[^<]*<\/title>\n<style data-artifact="style">\n([\s\S]*)\n<\/style>\n<\/head>\n<body>\n<!-- artifact:markup:start -->\n([\s\S]*)\n<!-- artifact:markup:end -->\n<script data-artifact="behavior">\n([\s\S]*)\n<\/script>\n<\/body>\n<\/html>\n$/;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** First non-empty line of the requirements, cut to 60 characters. */
export function titleFromRequirements(requirements: string): string {
  const firstLine = requirements
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  if (!firstLine) return 'Prototype';
  // code points, so a surrogate pair is never split
  const chars = Array.from(firstLine);
  return chars.length > TITLE_LIMIT ? `${chars.slice(0, TITLE_LIMIT - 3).join('')}...` : firstLine;
}

/**
 * Style goes in the head, markup then behavior at the end of the body.
 * Field contents are inserted verbatim.
 */
export function composePrototypeDocument(artifact: Artifact, title = 'Prototype'): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="UTF-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `<title>${escapeHtml(title)}</title>`,
    '<style data-artifact="style">',
    artifact.style,
    '</style>',
    '</head>',
    '<body>',
    '<!-- artifact:markup:start -->',
    artifact.markup,
    '<!-- artifact:markup:end -->',
    '<script data-artifact="behavior">',
    artifact.behavior,
    '</script>',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

/** Inverse of composePrototypeDocument; null for any other document. */
export function parsePrototypeDocument(document: string): Artifact | null {
  const match = DOCUMENT_PATTERN.exec(document);
  if (!match) return null;
  return {
    style: match[1],
    markup: match[2],
    behavior: match[3],
  };
}

export function generatePrototypeFilename(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 10);
  return `prototype-${timestamp}-${random}.html`;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

export interface WrittenPrototype {
  filename: string;
  outputFile: string;
}

const MAX_NAME_ATTEMPTS = 5;

/**
 * Exclusive create: an existing file is never overwritten, a collision
 * gets a numeric suffix.
 */
export async function writePrototypeFile(
  outputDir: string,
  artifact: Artifact,
  title: string,
  filename: string = generatePrototypeFilename()
): Promise<WrittenPrototype> {
  if (!artifact.markup.trim()) {
    throw new FinalizationError('Cannot publish a prototype without markup');
  }

  const document = composePrototypeDocument(artifact, title);

  try {
    await fs.promises.mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new ResourceError(`Cannot create output directory ${outputDir}: ${describeError(error)}`, error);
  }

  const base = filename.replace(/\.html$/, '');
  for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
    const candidate = attempt === 0 ? `${base}.html` : `${base}-${attempt}.html`;
    const outputFile = path.join(outputDir, candidate);
    try {
      await fs.promises.writeFile(outputFile, document, { encoding: 'utf8', flag: 'wx' });
      return { filename: candidate, outputFile };
    } catch (error) {
      if (isAlreadyExists(error)) continue;
      throw new ResourceError(`Cannot write ${outputFile}: ${describeError(error)}`, error);
    }
  }

  throw new ResourceError(`No free file name for ${base}.html in ${outputDir}`);
}
