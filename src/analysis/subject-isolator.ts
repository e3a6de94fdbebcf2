import sharp from 'sharp';

import { debug } from '../shared/debug.js';
import type { BoundingBox, SubjectIsolation } from './extractor.js';

export interface IsolationOptions {
  /** Margin around the subject as a fraction of its longer side. */
  paddingRatio: number;
  /** Longest thumbnail edge in pixels. */
  thumbnailSize: number;
}

const CROP_QUALITY = 90;
const THUMBNAIL_QUALITY = 85;

/**
 * Finds the subject by trimming the uniform background around it, then
 * returns a padded crop and a thumbnail.
 *
 * The background colour is taken from the top-left pixel. A photo with no
 * uniform border yields the whole frame as the subject; a photo that is
 * entirely one colour yields null.
 *
 * Throws when the bytes are not a decodable image.
 */
export async function isolateSubject(
  image: Buffer,
  options: IsolationOptions,
): Promise<SubjectIsolation | null> {
  // Materialize the EXIF rotation so every later step sees upright pixels.
  const upright = await sharp(image, { failOnError: false }).rotate().png().toBuffer();
  const meta = await sharp(upright).metadata();
  const width = meta.width ?? 0;
  const height = meta.height ?? 0;
  if (width <= 0 || height <= 0) {
    throw new Error('Invalid image dimensions');
  }

  const stats = await sharp(upright).stats();
  if (stats.channels.every((c) => c.min === c.max)) {
    debug('isolate', 'Uniform image, no subject', { width, height });
    return null;
  }

  const { info } = await sharp(upright).trim().toBuffer({ resolveWithObject: true });
  const box: BoundingBox = {
    left: Math.abs(info.trimOffsetLeft ?? 0),
    top: Math.abs(info.trimOffsetTop ?? 0),
    width: info.width,
    height: info.height,
  };

  if (box.width <= 0 || box.height <= 0) {
    debug('isolate', 'Empty bounding box, no subject');
    return null;
  }

  const pad = Math.round(options.paddingRatio * Math.max(box.width, box.height));
  const left = Math.max(0, box.left - pad);
  const top = Math.max(0, box.top - pad);
  const right = Math.min(width, box.left + box.width + pad);
  const bottom = Math.min(height, box.top + box.height + pad);

  const crop = await sharp(upright)
    .extract({ left, top, width: right - left, height: bottom - top })
    .jpeg({ quality: CROP_QUALITY })
    .toBuffer();

  const thumbnail = await sharp(crop)
    .resize(options.thumbnailSize, options.thumbnailSize, {
      fit: 'inside',
      withoutEnlargement: true,
    })
    .sharpen()
    .jpeg({ quality: THUMBNAIL_QUALITY })
    .toBuffer();

  debug('isolate', 'Subject isolated', {
    image: { width, height },
    box,
    padded: { left, top, width: right - left, height: bottom - top },
  });

  return { crop, thumbnail, box };
}
