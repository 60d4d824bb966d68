import { findSizePreset, type AppConfig, type Limits } from './config.js';
import { InvalidParameterError } from './errors.js';
import type { StyleCatalog } from './styles.js';
import type { GenerationRequest } from './types.js';

/** Loose user input; anything omitted comes from the configured defaults. */
export interface GenerationInput {
  prompt: string;
  style?: string;
  /** Size preset name or `WxH`; ignored when width and height are given. */
  size?: string;
  width?: number;
  height?: number;
  steps?: number;
  guidanceScale?: number;
  variationCount?: number;
  negativePrompt?: string;
  seed?: number;
}

function checkRange(label: string, value: number, min: number, max: number, integer: boolean) {
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value)) || value < min || value > max) {
    throw new InvalidParameterError(`${label} must be ${integer ? 'an integer ' : ''}between ${min} and ${max}, got ${value}`);
  }
}

export function validateRequest(request: GenerationRequest, limits: Limits, catalog: StyleCatalog): void {
  if (!request.prompt.trim()) {
    throw new InvalidParameterError('Prompt must not be empty');
  }
  // Throws UnknownStyleError
  catalog.get(request.style);

  for (const [label, value] of [['width', request.width], ['height', request.height]] as const) {
    checkRange(label, value, limits.minDimension, limits.maxDimension, true);
    if (value % 8 !== 0) {
      throw new InvalidParameterError(`${label} must be a multiple of 8, got ${value}`);
    }
  }
  checkRange('steps', request.steps, limits.minSteps, limits.maxSteps, true);
  checkRange('guidanceScale', request.guidanceScale, limits.minGuidance, limits.maxGuidance, false);
  checkRange('variationCount', request.variationCount, 1, limits.maxVariations, true);

  if (request.seed !== undefined && (!Number.isSafeInteger(request.seed) || request.seed < 0)) {
    throw new InvalidParameterError(`seed must be a non-negative integer, got ${request.seed}`);
  }
}

export function buildRequest(input: GenerationInput, config: AppConfig, catalog: StyleCatalog): GenerationRequest {
  let { width, height } = input;
  if ((width === undefined || height === undefined) && input.size) {
    const preset = findSizePreset(input.size);
    if (!preset) throw new InvalidParameterError(`Unknown size: "${input.size}"`);
    width = preset.width;
    height = preset.height;
  }

  const request: GenerationRequest = {
    prompt: input.prompt.trim(),
    style: input.style ?? catalog.defaultStyle,
    width: width ?? config.defaults.width,
    height: height ?? config.defaults.height,
    steps: input.steps ?? config.defaults.steps,
    guidanceScale: input.guidanceScale ?? config.defaults.guidanceScale,
    variationCount: input.variationCount ?? 1,
    negativePrompt: input.negativePrompt?.trim() || undefined,
    seed: input.seed,
  };
  validateRequest(request, config.limits, catalog);
  return request;
}

function optionalNumber(body: object, key: string): number | undefined {
  if (!(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  if (value === undefined || value === null || value === '') return undefined;
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || Number.isNaN(n)) {
    throw new InvalidParameterError(`${key} must be a number`);
  }
  return n;
}

function optionalString(body: object, key: string): string | undefined {
  if (!(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new InvalidParameterError(`${key} must be a string`);
  return value;
}

/** Reads a `GenerationInput` out of an untrusted JSON body. */
export function parseGenerationInput(body: unknown): GenerationInput {
  if (!body || typeof body !== 'object') {
    throw new InvalidParameterError('Request body must be a JSON object');
  }
  const prompt = optionalString(body, 'prompt');
  if (!prompt?.trim()) throw new InvalidParameterError('prompt required');

  return {
    prompt,
    style: optionalString(body, 'style'),
    size: optionalString(body, 'size'),
    width: optionalNumber(body, 'width'),
    height: optionalNumber(body, 'height'),
    steps: optionalNumber(body, 'steps'),
    guidanceScale: optionalNumber(body, 'guidanceScale'),
    variationCount: optionalNumber(body, 'variationCount'),
    negativePrompt: optionalString(body, 'negativePrompt'),
    seed: optionalNumber(body, 'seed'),
  };
}
