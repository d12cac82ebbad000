import sharp from 'sharp';
import type { ImageAttachment } from '../llm/openRouterService';
import { createLogger } from '../logger';

const log = createLogger('screenshot');

export interface ScreenshotLimits {
  maxWidth: number;
  maxBytes: number;
}

const START_QUALITY = 85;
const MIN_QUALITY = 45;

/**
 * Shrinks a full-page capture for the vision judge: never wider than
 * `maxWidth`, JPEG, quality stepped down until it fits `maxBytes`.
 * A result above the limit at minimum quality is returned as is.
 */
export async function prepareScreenshotForJudge(png: Buffer, limits: ScreenshotLimits): Promise<ImageAttachment> {
  const resized = await sharp(png)
    .resize({ width: limits.maxWidth, withoutEnlargement: true })
    .png()
    .toBuffer();

  let quality = START_QUALITY;
  let current = await sharp(resized).jpeg({ quality }).toBuffer();

  while (current.length > limits.maxBytes && quality > MIN_QUALITY) {
    quality -= 10;
    current = await sharp(resized).jpeg({ quality }).toBuffer();
    log.debug(`Compressed to quality ${quality}: ${current.length} bytes`);
  }

  if (current.length > limits.maxBytes) {
    log.warn(`Screenshot still ${current.length} bytes at quality ${quality}`);
  }

  return { data: current, mimeType: 'image/jpeg' };
}
