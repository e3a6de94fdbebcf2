import type { Resolution, Resolver } from '../matching/resolver.js';
import { debug, errorMessage } from '../shared/debug.js';
import { StoneError } from '../shared/errors.js';
import type { FeatureExtractor } from './extractor.js';

/** Everything the intake needs from an accepted photo. */
export interface PhotoAnalysis {
  embedding: Float32Array;
  crop: Buffer;
  thumbnail: Buffer;
  /** Classifier score the photo passed with. */
  score: number;
  decision: Resolution;
}

/**
 * Photo -> fingerprint -> decision.
 *
 * Throws StoneError with NO_SUBJECT_DETECTED, NOT_A_STONE or
 * EXTRACTION_FAILURE. Nothing is retried.
 */
export class PhotoAnalyzer {
  constructor(
    private readonly extractor: FeatureExtractor,
    private readonly resolver: Resolver,
  ) {}

  async analyze(image: Buffer): Promise<PhotoAnalysis> {
    const isolation = await this.extract('isolate', () => this.extractor.isolateSubject(image));
    if (isolation === null) {
      throw new StoneError('NO_SUBJECT_DETECTED', 'No subject found in the photo');
    }

    const { crop, thumbnail } = isolation;
    const classification = await this.extract('classify', () => this.extractor.classify(crop));
    if (!classification.isSubject) {
      debug('pipeline', 'Rejected by classifier', { score: classification.score });
      throw new StoneError('NOT_A_STONE', 'The photo does not look like a decorated stone');
    }

    const embedding = await this.extract('embed', () => this.extractor.embed(crop));
    const decision = this.resolver.resolve(embedding);

    debug('pipeline', 'Photo analyzed', { score: classification.score, decision: decision.kind });
    return { embedding, crop, thumbnail, score: classification.score, decision };
  }

  private async extract<T>(step: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      debug('pipeline', `Extractor ${step} failed`, { error: errorMessage(err) });
      throw new StoneError('EXTRACTION_FAILURE', `Feature extraction failed at ${step}`, {
        cause: err,
      });
    }
  }
}
