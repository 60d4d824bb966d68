import type { ImagecraftError } from './errors.js';

/**
 * What the user asked for. Validated by `validateRequest` before any network call.
 */
export interface GenerationRequest {
  prompt: string;
  style: string;
  width: number;
  height: number;
  steps: number;
  guidanceScale: number;
  variationCount: number;
  negativePrompt?: string;
  seed?: number;
}

export interface GeneratedImage {
  /** Position in the batch, starting at 0. */
  variation: number;
  data: Buffer;
  contentType: string;
  seed: number;
  /** Model that produced the image (may be a fallback). */
  model: string;
}

/** A variation that could not be produced; the rest of the batch went on. */
export interface VariationFailure {
  variation: number;
  seed: number;
  error: ImagecraftError;
}

/**
 * Frozen once produced. Holds at least one image.
 */
export interface GenerationResult {
  readonly images: readonly GeneratedImage[];
  readonly failures: readonly VariationFailure[];
  readonly request: GenerationRequest;
  readonly createdAt: Date;
}

export interface GalleryEntry {
  id: string;
  imagePath: string;
  prompt: string;
  style: string;
  /** ISO 8601 */
  createdAt: string;
  negativePrompt?: string;
  seed?: number;
  width: number;
  height: number;
  steps: number;
  guidanceScale: number;
  variationIndex: number;
  favorite: boolean;
}

export interface StylePreset {
  name: string;
  promptSuffix: string;
  negativePrompt: string;
  description: string;
}
