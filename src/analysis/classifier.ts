import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { dataPath } from '../shared/data-path.js';
import { debug } from '../shared/debug.js';
import { dot, mean } from '../shared/vector.js';
import type { Classification } from './extractor.js';

const PromptFileSchema = z.object({
  positive: z.array(z.string().min(1)).min(1),
  negative: z.array(z.string().min(1)).min(1),
});

export type ClassifierPrompts = z.infer<typeof PromptFileSchema>;

/** Reads the positive/negative prompt lists from data/classifier-prompts.json. */
export function loadClassifierPrompts(path = dataPath('classifier-prompts.json')): ClassifierPrompts {
  return PromptFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

/** Anything able to embed prompt text into the image embedding space. */
export interface TextEmbedder {
  embedTexts(texts: string[]): Promise<Float32Array[]>;
}

interface PromptVectors {
  positive: Float32Array[];
  negative: Float32Array[];
}

/**
 * Zero-shot "is this a decorated stone" check.
 *
 * score = mean similarity to the positive prompts minus mean similarity to
 * the negative prompts. Prompt embeddings are fetched on first use and
 * cached; a failed fetch leaves nothing cached.
 */
export class PromptClassifier {
  private promptVectors: PromptVectors | null = null;

  constructor(
    private readonly embedder: TextEmbedder,
    private readonly prompts: ClassifierPrompts,
    private readonly decisionMargin: number,
  ) {}

  async classify(imageEmbedding: Float32Array): Promise<Classification> {
    const { positive, negative } = await this.loadPromptVectors();

    const positiveSim = mean(positive.map((p) => dot(imageEmbedding, p)));
    const negativeSim = mean(negative.map((p) => dot(imageEmbedding, p)));
    const score = positiveSim - negativeSim;

    debug('classify', 'Scored', { positiveSim, negativeSim, score, margin: this.decisionMargin });
    return { isSubject: score > this.decisionMargin, score };
  }

  private async loadPromptVectors(): Promise<PromptVectors> {
    if (this.promptVectors !== null) {
      return this.promptVectors;
    }

    const { positive, negative } = this.prompts;
    const vectors = await this.embedder.embedTexts([...positive, ...negative]);
    this.promptVectors = {
      positive: vectors.slice(0, positive.length),
      negative: vectors.slice(positive.length),
    };
    debug('classify', 'Prompt embeddings cached', { prompts: vectors.length });
    return this.promptVectors;
  }
}
