import Bottleneck from 'bottleneck';
import { setTimeout as delay } from 'node:timers/promises';
import type { AppConfig, RetryPolicy } from '../config.js';
import {
  AuthenticationError,
  CancelledError,
  CorruptImageError,
  InvalidParameterError,
  RateLimitError,
  TransientUnavailableError,
  errorMessage,
  isImagecraftError,
} from '../errors.js';
import { createLogger, preview } from '../logger.js';
import { validateRequest } from '../request.js';
import { styleCatalog as defaultCatalog, type StyleCatalog } from '../styles.js';
import type { GeneratedImage, GenerationRequest, GenerationResult, VariationFailure } from '../types.js';

const log = createLogger('Inference');

const TRANSIENT_STATUSES = new Set([500, 502, 503, 504]);
const MODEL_GONE_STATUSES = new Set([404, 410]);

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface InferenceClientOptions {
  config: Pick<AppConfig, 'apiKey' | 'apiUrl' | 'model' | 'fallbackModels' | 'limits' | 'retry' | 'variationSpacingMs'>;
  catalog?: StyleCatalog;
  fetch?: FetchLike;
  sleep?: SleepFn;
  /** Seconds since epoch; base seed when the request has none. */
  now?: () => number;
}

export interface AttemptInfo {
  variation: number;
  attempt: number;
  model: string;
  /** Set when the attempt failed transiently and a retry is scheduled. */
  retryInMs?: number;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  onAttempt?: (info: AttemptInfo) => void;
}

export interface ConnectionStatus {
  ok: boolean;
  message: string;
}

/** Provider error/status body; every field is untrusted. */
interface ProviderBody {
  error?: string;
  estimated_time?: number;
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Bounds a provider-suggested wait. Non-numeric or negative hints count as no hint.
 */
export function clampDelay(hintSeconds: unknown, maxDelayMs: number): number | undefined {
  if (typeof hintSeconds !== 'number' || !Number.isFinite(hintSeconds) || hintSeconds < 0) {
    return undefined;
  }
  return Math.min(Math.round(hintSeconds * 1000), maxDelayMs);
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.backoffBaseMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

async function readProviderBody(res: Response): Promise<ProviderBody> {
  const text = await res.text().catch(() => '');
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === 'object') {
      return {
        error: 'error' in parsed && typeof parsed.error === 'string' ? parsed.error : undefined,
        estimated_time: 'estimated_time' in parsed && typeof parsed.estimated_time === 'number'
          ? parsed.estimated_time
          : undefined,
      };
    }
  } catch {
    // not JSON; fall through with the raw text
  }
  return { error: text.trim() || undefined };
}

type AttemptOutcome =
  | { kind: 'image'; data: Buffer; contentType: string }
  | { kind: 'transient'; reason: string; hintSeconds?: number }
  | { kind: 'model-gone'; reason: string };

export class InferenceClient {
  private readonly config: InferenceClientOptions['config'];
  private readonly catalog: StyleCatalog;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly limiter: Bottleneck;

  constructor(options: InferenceClientOptions) {
    this.config = options.config;
    this.catalog = options.catalog ?? defaultCatalog;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
    this.limiter = new Bottleneck({
      maxConcurrent: 1,
      minTime: options.config.variationSpacingMs,
    });
  }

  checkConnection(): ConnectionStatus {
    const key = this.config.apiKey;
    if (!key) {
      return { ok: false, message: 'API key not found! Set HUGGINGFACE_API_KEY in .env.' };
    }
    if (!key.startsWith('hf_')) {
      return { ok: false, message: "API key format is wrong! It should start with 'hf_'." };
    }
    return { ok: true, message: 'API connection ready.' };
  }

  async generate(request: GenerationRequest, options: GenerateOptions = {}): Promise<GenerationResult> {
    const { signal } = options;
    validateRequest(request, this.config.limits, this.catalog);

    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new AuthenticationError('HUGGINGFACE_API_KEY is not set');
    }

    const prompt = this.catalog.buildPrompt(request.prompt, request.style);
    const negativePrompt = this.catalog.buildNegativePrompt(request.style, request.negativePrompt);
    const baseSeed = request.seed ?? this.now();

    log.info(`generating ${request.variationCount} image(s): "${preview(prompt)}" at ${request.width}x${request.height}`);

    const images: GeneratedImage[] = [];
    const failures: VariationFailure[] = [];
    for (let variation = 0; variation < request.variationCount; variation++) {
      throwIfCancelled(signal);
      const seed = baseSeed + variation;
      try {
        const image = await this.limiter.schedule(() =>
          this.generateOne(apiKey, { prompt, negativePrompt, seed, request, variation }, options)
        );
        images.push(image);
        log.info(`image ${variation + 1}/${request.variationCount} ready (${image.model})`);
      } catch (err) {
        if (!isImagecraftError(err) || err instanceof CancelledError) throw err;
        log.warn(`image ${variation + 1}/${request.variationCount} failed: ${err.message}`);
        failures.push({ variation, seed, error: err });
        // A rejected key ends the batch
        if (err instanceof AuthenticationError) break;
      }
    }

    const [firstFailure] = failures;
    if (images.length === 0 && firstFailure) {
      throw firstFailure.error;
    }

    return Object.freeze({
      images: Object.freeze(images),
      failures: Object.freeze(failures),
      request: Object.freeze({ ...request }),
      createdAt: new Date(),
    });
  }

  private async generateOne(
    apiKey: string,
    job: { prompt: string; negativePrompt: string; seed: number; request: GenerationRequest; variation: number },
    { signal, onAttempt }: GenerateOptions,
  ): Promise<GeneratedImage> {
    const { request } = job;
    const body = JSON.stringify({
      inputs: job.prompt,
      parameters: {
        negative_prompt: job.negativePrompt || undefined,
        width: request.width,
        height: request.height,
        num_inference_steps: request.steps,
        guidance_scale: request.guidanceScale,
        seed: job.seed,
      },
    });

    const policy = this.config.retry;
    const models = [this.config.model, ...this.config.fallbackModels];
    let modelIndex = 0;
    let attempt = 0;
    let waited = 0;

    for (;;) {
      throwIfCancelled(signal);
      const model = models[modelIndex];
      attempt++;

      const outcome = await this.attempt(model, apiKey, body, signal).catch((err: unknown) => {
        if (signal?.aborted && !isImagecraftError(err)) throw new CancelledError();
        throw err;
      });

      if (outcome.kind === 'image') {
        onAttempt?.({ variation: job.variation, attempt, model });
        return { variation: job.variation, data: outcome.data, contentType: outcome.contentType, seed: job.seed, model };
      }

      if (outcome.kind === 'model-gone') {
        onAttempt?.({ variation: job.variation, attempt, model });
        log.warn(`model ${model} unavailable (${outcome.reason}), trying next model...`);
        modelIndex++;
        if (modelIndex >= models.length) {
          throw new InvalidParameterError(`No available model among: ${models.join(', ')}`);
        }
        // Fallbacks share the attempt budget
        if (attempt >= policy.maxAttempts) {
          throw new TransientUnavailableError(
            `No model answered within ${attempt} attempt(s): ${outcome.reason}`,
            attempt,
          );
        }
        continue;
      }

      const wait = clampDelay(outcome.hintSeconds, policy.maxDelayMs) ?? backoffDelay(attempt, policy);
      if (attempt >= policy.maxAttempts || waited + wait > policy.maxTotalWaitMs) {
        onAttempt?.({ variation: job.variation, attempt, model });
        throw new TransientUnavailableError(
          `Model is still unavailable after ${attempt} attempt(s): ${outcome.reason}`,
          attempt,
        );
      }

      onAttempt?.({ variation: job.variation, attempt, model, retryInMs: wait });
      log.warn(`${outcome.reason}; retrying in ${wait}ms (attempt ${attempt}/${policy.maxAttempts})`);
      try {
        await this.sleep(wait, signal);
      } catch (err) {
        if (signal?.aborted) throw new CancelledError();
        throw err;
      }
      waited += wait;
    }
  }

  private async attempt(model: string, apiKey: string, body: string, signal?: AbortSignal): Promise<AttemptOutcome> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.config.apiUrl}${model}`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'image/png',
        },
        body,
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw new CancelledError();
      return { kind: 'transient', reason: `network error: ${errorMessage(err)}` };
    }

    if (res.ok) {
      const contentType = res.headers.get('content-type') ?? '';
      if (!contentType.startsWith('image/')) {
        const detail = await readProviderBody(res);
        throw new CorruptImageError(`Expected an image but received "${contentType || 'no content type'}"${detail.error ? `: ${detail.error}` : ''}`);
      }
      return { kind: 'image', data: Buffer.from(await res.arrayBuffer()), contentType };
    }

    const detail = await readProviderBody(res);
    const reason = detail.error ?? `HTTP ${res.status}`;

    if (TRANSIENT_STATUSES.has(res.status)) {
      return { kind: 'transient', reason: `HTTP ${res.status} ${reason}`, hintSeconds: detail.estimated_time };
    }
    if (MODEL_GONE_STATUSES.has(res.status)) {
      return { kind: 'model-gone', reason };
    }
    if (res.status === 401 || res.status === 403) {
      log.error('API key was rejected');
      throw new AuthenticationError(`API key is invalid or lacks permission: ${reason}`);
    }
    if (res.status === 402 || res.status === 429) {
      throw new RateLimitError(`Rate limit or quota exceeded: ${reason}`);
    }
    throw new InvalidParameterError(`Provider rejected the request (HTTP ${res.status}): ${reason}`);
  }
}

function throwIfCancelled(signal?: AbortSignal) {
  if (signal?.aborted) throw new CancelledError();
}
