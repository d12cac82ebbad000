import type { Artifact } from '../jobs/types';

export const FENCE_TAGS = {
  markup: ['html', 'htm', 'xhtml'],
  style: ['css', 'style'],
  behavior: ['javascript', 'js'],
} as const;

function escapeForRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Body of the first fenced block whose info string starts with one of `tags`
 * (case-insensitive), trimmed. A tag must end at a non-word character, so
 * `js` does not match a `json` fence. Returns '' when no closed block exists.
 */
export function extractFencedBlock(response: string, tags: readonly string[]): string {
  const alternatives = tags.map(escapeForRegExp).join('|');
  const pattern = new RegExp('```[ \\t]*(?:' + alternatives + ')(?![\\w-])[^\\n]*\\n([\\s\\S]*?)```', 'i');
  const match = pattern.exec(response);
  return match ? match[1].trim() : '';
}

export function extractArtifact(response: string): Artifact {
  return {
    markup: extractFencedBlock(response, FENCE_TAGS.markup),
    style: extractFencedBlock(response, FENCE_TAGS.style),
    behavior: extractFencedBlock(response, FENCE_TAGS.behavior),
  };
}
