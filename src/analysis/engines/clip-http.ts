/**
 * HTTP client for the CLIP inference service.
 *
 * The service runs the vision-language model (ViT-B/32) and exposes two
 * endpoints:
 *   POST /embed/image  { image_base64 }  -> { embedding: number[] }
 *   POST /embed/text   { texts }         -> { embeddings: number[][] }
 *
 * Responses are validated and every vector is re-normalized locally, so the
 * rest of the system can rely on unit-norm embeddings whatever the server
 * does.
 */

import { z } from 'zod';

import { debug, debugTimedAsync } from '../../shared/debug.js';
import { EMBEDDING_DIMENSIONS } from '../../shared/types.js';
import { normalize } from '../../shared/vector.js';

const Vector = z.array(z.number().finite()).length(EMBEDDING_DIMENSIONS);

const ImageResponse = z.object({ embedding: Vector });
const TextResponse = z.object({ embeddings: z.array(Vector) });

export interface ClipClientOptions {
  endpoint: string;
  timeoutMs: number;
}

export class ClipHttpClient {
  constructor(private readonly options: ClipClientOptions) {}

  async embedImage(image: Buffer): Promise<Float32Array> {
    const body = await this.post('/embed/image', { image_base64: image.toString('base64') });
    const parsed = ImageResponse.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Malformed image embedding response: ${parsed.error.issues[0]?.message}`);
    }
    return normalize(parsed.data.embedding);
  }

  async embedTexts(texts: string[]): Promise<Float32Array[]> {
    const body = await this.post('/embed/text', { texts });
    const parsed = TextResponse.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Malformed text embedding response: ${parsed.error.issues[0]?.message}`);
    }
    if (parsed.data.embeddings.length !== texts.length) {
      throw new Error(
        `Expected ${texts.length} text embeddings, got ${parsed.data.embeddings.length}`,
      );
    }
    return parsed.data.embeddings.map((v) => normalize(v));
  }

  private async post(path: string, payload: unknown): Promise<unknown> {
    const url = `${this.options.endpoint}${path}`;
    return debugTimedAsync('clip', `POST ${path}`, async () => {
      const res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!res.ok) {
        debug('clip', 'Service returned an error', { path, status: res.status });
        throw new Error(`CLIP service ${path} returned ${res.status}`);
      }

      return (await res.json()) as unknown;
    });
  }
}
