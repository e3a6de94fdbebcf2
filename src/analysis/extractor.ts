/**
 * FeatureExtractor interface.
 *
 * The analysis pipeline depends on this interface only. Implementations
 * throw on failure; the pipeline maps every thrown error to
 * EXTRACTION_FAILURE.
 */

/** Pixel rectangle in the upright (EXIF-rotated) image. */
export interface BoundingBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface SubjectIsolation {
  /** Padded crop around the subject, JPEG. */
  crop: Buffer;
  /** Small sharpened preview of the crop, JPEG. */
  thumbnail: Buffer;
  /** Subject bounds before padding. */
  box: BoundingBox;
}

export interface Classification {
  isSubject: boolean;
  /** Mean similarity to positive prompts minus mean to negative prompts. */
  score: number;
}

export interface FeatureExtractor {
  /** Null when no foreground subject can be found. */
  isolateSubject(image: Buffer): Promise<SubjectIsolation | null>;
  classify(crop: Buffer): Promise<Classification>;
  /** Unit-norm embedding of the crop. */
  embed(crop: Buffer): Promise<Float32Array>;
  name(): string;
}
