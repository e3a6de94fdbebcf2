import type { ExtractorConfig } from '../config/extractor-config.js';
import { PromptClassifier, type ClassifierPrompts } from './classifier.js';
import { ClipHttpClient } from './engines/clip-http.js';
import type { Classification, FeatureExtractor, SubjectIsolation } from './extractor.js';
import { isolateSubject } from './subject-isolator.js';

/** The subset of the CLIP client the extractor needs. */
export interface ClipBackend {
  embedImage(image: Buffer): Promise<Float32Array>;
  embedTexts(texts: string[]): Promise<Float32Array[]>;
}

/**
 * FeatureExtractor backed by sharp (subject isolation) and the CLIP
 * service (embeddings, zero-shot classification).
 *
 * A crop is embedded once: classify() and embed() on the same buffer share
 * the vector.
 */
export class ClipFeatureExtractor implements FeatureExtractor {
  private readonly backend: ClipBackend;
  private readonly classifier: PromptClassifier;
  private readonly embeddings = new WeakMap<Buffer, Promise<Float32Array>>();

  constructor(
    private readonly config: ExtractorConfig,
    prompts: ClassifierPrompts,
    decisionMargin: number,
    backend?: ClipBackend,
  ) {
    this.backend =
      backend ?? new ClipHttpClient({ endpoint: config.endpoint, timeoutMs: config.timeoutMs });
    this.classifier = new PromptClassifier(this.backend, prompts, decisionMargin);
  }

  name(): string {
    return 'clip-http';
  }

  isolateSubject(image: Buffer): Promise<SubjectIsolation | null> {
    return isolateSubject(image, {
      paddingRatio: this.config.paddingRatio,
      thumbnailSize: this.config.thumbnailSize,
    });
  }

  async classify(crop: Buffer): Promise<Classification> {
    return this.classifier.classify(await this.embed(crop));
  }

  embed(crop: Buffer): Promise<Float32Array> {
    let pending = this.embeddings.get(crop);
    if (pending === undefined) {
      pending = this.backend.embedImage(crop);
      this.embeddings.set(crop, pending);
    }
    return pending;
  }
}
