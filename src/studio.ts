import type { AppConfig } from './config.js';
import {
  AuthenticationError,
  CancelledError,
  ConfigurationError,
  CorruptImageError,
  GenerationInProgressError,
  InvalidParameterError,
  NotFoundError,
  RateLimitError,
  TransientUnavailableError,
  UnknownStyleError,
  isImagecraftError,
  type ErrorCode,
} from './errors.js';
import type { GalleryStore } from './gallery.js';
import { decode, encode, resize, type RasterImage } from './image/processor.js';
import { createLogger, preview } from './logger.js';
import { buildRequest, type GenerationInput } from './request.js';
import type { AttemptInfo, InferenceClient } from './services/inference.js';
import { styleCatalog as defaultCatalog, type StyleCatalog } from './styles.js';
import type { GalleryEntry, GeneratedImage, GenerationRequest, GenerationResult, VariationFailure } from './types.js';

const log = createLogger('Studio');

export type StudioEvent =
  | { type: 'generation:started'; request: GenerationRequest }
  | { type: 'generation:attempt'; attempt: AttemptInfo }
  | { type: 'generation:saved'; entries: GalleryEntry[]; failures: FailureReport[]; message: string }
  | { type: 'generation:error'; code: ErrorCode | 'unknown'; message: string };

export interface StudioDeps {
  config: AppConfig;
  client: InferenceClient;
  gallery: GalleryStore;
  catalog?: StyleCatalog;
}

export interface StudioGenerateOptions {
  signal?: AbortSignal;
  onEvent?: (event: StudioEvent) => void;
}

/** One variation of a batch that produced no image. */
export interface FailureReport {
  variation: number;
  code: ErrorCode;
  message: string;
}

export interface GenerationOutcome {
  entries: GalleryEntry[];
  failures: FailureReport[];
  result: GenerationResult;
  message: string;
}

export const GENERATION_FAILED = 'Could not generate image. Please try again later.';

/**
 * User-facing text for a failed operation. Each failure class gets its own reason;
 * anything else gets `fallback`.
 */
export function describeFailure(err: unknown, fallback = GENERATION_FAILED): string {
  if (err instanceof AuthenticationError) {
    return 'API key is missing or invalid! Check HUGGINGFACE_API_KEY or get a new token from Hugging Face.';
  }
  if (err instanceof RateLimitError) {
    return 'Too many requests! Wait 1 minute and try again.';
  }
  if (err instanceof TransientUnavailableError) {
    return `The model is still loading after ${err.attempts} attempt(s). Please wait 30 seconds and try again.`;
  }
  if (err instanceof UnknownStyleError) {
    return `Unknown style "${err.style}". Pick one of the listed styles.`;
  }
  if (err instanceof InvalidParameterError) {
    return `Invalid request: ${err.message}`;
  }
  if (err instanceof CorruptImageError) {
    return 'The service returned an image that could not be read. Please try again.';
  }
  if (err instanceof NotFoundError) {
    return 'That image is no longer in the gallery.';
  }
  if (err instanceof CancelledError) {
    return 'Generation cancelled.';
  }
  if (err instanceof GenerationInProgressError) {
    return 'A generation is already running. Wait for it to finish or cancel it.';
  }
  if (err instanceof ConfigurationError) {
    return `Configuration error: ${err.message}`;
  }
  return fallback;
}

export function successMessage(count: number, failed = 0): string {
  const done = count === 1 ? 'Image generated successfully!' : `${count} images created successfully!`;
  return failed > 0 ? `${done} ${failed} could not be generated.` : done;
}

function report({ variation, error }: VariationFailure): FailureReport {
  return { variation, code: error.code, message: describeFailure(error) };
}

/**
 * Glue between user input, the inference client, the image processor and the gallery.
 * Runs one generation at a time.
 */
export class Studio {
  readonly config: AppConfig;
  readonly client: InferenceClient;
  readonly gallery: GalleryStore;
  readonly catalog: StyleCatalog;
  private controller: AbortController | null = null;

  constructor(deps: StudioDeps) {
    this.config = deps.config;
    this.client = deps.client;
    this.gallery = deps.gallery;
    this.catalog = deps.catalog ?? defaultCatalog;
  }

  get busy(): boolean {
    return this.controller !== null;
  }

  /** Aborts the pending generation. Returns false when nothing was running. */
  cancel(): boolean {
    if (!this.controller) return false;
    log.info('cancelling pending generation');
    this.controller.abort();
    return true;
  }

  async generate(input: GenerationInput, options: StudioGenerateOptions = {}): Promise<GenerationOutcome> {
    if (this.controller) throw new GenerationInProgressError();

    const controller = new AbortController();
    const external = options.signal;
    const forward = () => controller.abort();
    if (external?.aborted) controller.abort();
    external?.addEventListener('abort', forward, { once: true });
    this.controller = controller;

    try {
      const request = buildRequest(input, this.config, this.catalog);
      options.onEvent?.({ type: 'generation:started', request });
      log.info(`new generation: "${preview(request.prompt)}" [${request.style}]`);

      const raw = await this.client.generate(request, {
        signal: controller.signal,
        onAttempt: attempt => options.onEvent?.({ type: 'generation:attempt', attempt }),
      });
      const result = await this.normalize(raw);

      if (controller.signal.aborted) throw new CancelledError();
      const entries = await this.gallery.save(result);
      const failures = result.failures.map(report);
      for (const failure of failures) {
        log.warn(`image ${failure.variation + 1} could not be generated: ${failure.message}`);
      }
      return { entries, failures, result, message: successMessage(entries.length, failures.length) };
    } finally {
      external?.removeEventListener('abort', forward);
      this.controller = null;
    }
  }

  /**
   * Event stream over `generate`, for consumers that render progress.
   * Failures arrive as a `generation:error` event instead of a rejection.
   */
  async *stream(input: GenerationInput, options: { signal?: AbortSignal } = {}): AsyncGenerator<StudioEvent> {
    const pending: StudioEvent[] = [];
    let wake: (() => void) | undefined;
    let done = false;
    const push = (event: StudioEvent) => {
      pending.push(event);
      wake?.();
    };

    const run = this.generate(input, { signal: options.signal, onEvent: push })
      .then(
        outcome => push({
          type: 'generation:saved',
          entries: outcome.entries,
          failures: outcome.failures,
          message: outcome.message,
        }),
        (err: unknown) => {
          if (!isImagecraftError(err)) log.error('generation failed:', err);
          push({
            type: 'generation:error',
            code: isImagecraftError(err) ? err.code : 'unknown',
            message: describeFailure(err),
          });
        },
      )
      .finally(() => {
        done = true;
        wake?.();
      });

    try {
      for (;;) {
        for (let event = pending.shift(); event; event = pending.shift()) {
          yield event;
        }
        if (done) break;
        await new Promise<void>(resolve => { wake = resolve; });
        wake = undefined;
      }
      await run;
    } finally {
      if (!done) this.cancel();
    }
  }

  /**
   * Decodes every image, fits it to the requested size when the provider
   * returned another one, and re-encodes as PNG. A corrupt payload becomes a
   * failure of its variation; the batch fails only when nothing is left.
   */
  private async normalize(result: GenerationResult): Promise<GenerationResult> {
    const { width, height } = result.request;
    const images: GeneratedImage[] = [];
    const failures: VariationFailure[] = [...result.failures];
    for (const image of result.images) {
      let raster: RasterImage;
      try {
        raster = await decode(image.data);
      } catch (err) {
        if (!(err instanceof CorruptImageError)) throw err;
        failures.push({ variation: image.variation, seed: image.seed, error: err });
        continue;
      }
      if (raster.width !== width || raster.height !== height) {
        log.debug(`resizing ${raster.width}x${raster.height} to fit ${width}x${height}`);
        raster = resize(raster, width, height);
      }
      images.push({ ...image, data: await encode(raster, 'png'), contentType: 'image/png' });
    }

    const [firstFailure] = failures;
    if (images.length === 0 && firstFailure) throw firstFailure.error;

    failures.sort((a, b) => a.variation - b.variation);
    return Object.freeze({ ...result, images: Object.freeze(images), failures: Object.freeze(failures) });
  }
}
