import { createHash } from 'node:crypto';
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { debug } from '../shared/debug.js';

const REF_PREFIX = 'sha256:';

/**
 * Content-addressed photo storage for submissions that arrive without a
 * transport-provided handle. Identical bytes map to the same file.
 */
export class ImageStore {
  constructor(private readonly dir: string) {
    mkdirSync(dir, { recursive: true });
  }

  /** Writes the image once and returns its reference (`sha256:<hex>`). */
  put(bytes: Buffer): string {
    const hash = createHash('sha256').update(bytes).digest('hex');
    const path = this.pathFor(hash);
    if (!existsSync(path)) {
      writeFileSync(path, bytes);
      debug('images', 'Stored image', { hash, bytes: bytes.length });
    }
    return `${REF_PREFIX}${hash}`;
  }

  private pathFor(hash: string): string {
    return join(this.dir, `${hash}.jpg`);
  }
}
