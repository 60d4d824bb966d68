import path from 'node:path';
import { ConfigurationError } from './errors.js';

export const HUGGINGFACE_API_URL = 'https://router.huggingface.co/hf-inference/models/';
export const DEFAULT_MODEL = 'stabilityai/stable-diffusion-2-1';

export interface SizePreset {
  name: string;
  width: number;
  height: number;
}

export const IMAGE_SIZES: readonly SizePreset[] = Object.freeze([
  { name: 'Square (512x512)', width: 512, height: 512 },
  { name: 'Landscape (768x512)', width: 768, height: 512 },
  { name: 'Portrait (512x768)', width: 512, height: 768 },
  { name: 'Large Square (1024x1024)', width: 1024, height: 1024 },
]);

export const LIMITS = Object.freeze({
  minDimension: 256,
  maxDimension: 1024,
  minSteps: 15,
  maxSteps: 50,
  minGuidance: 1,
  maxGuidance: 20,
  maxVariations: 4,
});

export type Limits = typeof LIMITS;

export interface GenerationDefaults {
  width: number;
  height: number;
  steps: number;
  guidanceScale: number;
}

export interface RetryPolicy {
  /** Attempts per image, the first one included. */
  maxAttempts: number;
  backoffBaseMs: number;
  /** Upper bound for a single wait, provider hints included. */
  maxDelayMs: number;
  /** Upper bound for all waits of one image. */
  maxTotalWaitMs: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  apiKey?: string;
  apiUrl: string;
  model: string;
  fallbackModels: string[];
  defaults: GenerationDefaults;
  limits: Limits;
  retry: RetryPolicy;
  variationSpacingMs: number;
  galleryDir: string;
  logLevel: LogLevel;
  port: number;
  allowedOrigins: string[];
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number, integer = true): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigurationError(`${key} must be a non-negative ${integer ? 'integer' : 'number'}, got "${raw}"`);
  }
  return value;
}

function readList(env: NodeJS.ProcessEnv, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (raw === undefined) return fallback;
  return raw.split(',').map(s => s.trim()).filter(Boolean);
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env.IMAGECRAFT_LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return 'info';
  const level = LOG_LEVELS.find(l => l === raw);
  if (!level) {
    throw new ConfigurationError(`IMAGECRAFT_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

/** Defaults must pass the request checks. */
function checkDefaults(defaults: GenerationDefaults, limits: Limits) {
  const outside = (value: number, min: number, max: number) => value < min || value > max;
  for (const [key, value] of [['IMAGECRAFT_DEFAULT_WIDTH', defaults.width], ['IMAGECRAFT_DEFAULT_HEIGHT', defaults.height]] as const) {
    if (outside(value, limits.minDimension, limits.maxDimension) || value % 8 !== 0) {
      throw new ConfigurationError(
        `${key} must be a multiple of 8 between ${limits.minDimension} and ${limits.maxDimension}, got ${value}`
      );
    }
  }
  if (outside(defaults.steps, limits.minSteps, limits.maxSteps)) {
    throw new ConfigurationError(
      `IMAGECRAFT_DEFAULT_STEPS must be between ${limits.minSteps} and ${limits.maxSteps}, got ${defaults.steps}`
    );
  }
  if (outside(defaults.guidanceScale, limits.minGuidance, limits.maxGuidance)) {
    throw new ConfigurationError(
      `IMAGECRAFT_DEFAULT_GUIDANCE must be between ${limits.minGuidance} and ${limits.maxGuidance}, got ${defaults.guidanceScale}`
    );
  }
}

/**
 * Builds the application configuration from the environment.
 * Entry points load `.env` through `dotenv/config` before calling this.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const apiKey = env.HUGGINGFACE_API_KEY?.trim() || undefined;

  const retry: RetryPolicy = {
    maxAttempts: readNumber(env, 'IMAGECRAFT_MAX_ATTEMPTS', 5),
    backoffBaseMs: readNumber(env, 'IMAGECRAFT_BACKOFF_BASE_MS', 2000),
    maxDelayMs: readNumber(env, 'IMAGECRAFT_MAX_DELAY_MS', 60_000),
    maxTotalWaitMs: readNumber(env, 'IMAGECRAFT_MAX_TOTAL_WAIT_MS', 180_000),
  };
  if (retry.maxAttempts < 1) {
    throw new ConfigurationError('IMAGECRAFT_MAX_ATTEMPTS must be at least 1');
  }

  const defaults: GenerationDefaults = {
    width: readNumber(env, 'IMAGECRAFT_DEFAULT_WIDTH', 512),
    height: readNumber(env, 'IMAGECRAFT_DEFAULT_HEIGHT', 512),
    steps: readNumber(env, 'IMAGECRAFT_DEFAULT_STEPS', 25),
    guidanceScale: readNumber(env, 'IMAGECRAFT_DEFAULT_GUIDANCE', 7.5, false),
  };
  checkDefaults(defaults, LIMITS);

  return {
    apiKey,
    apiUrl: env.HUGGINGFACE_API_URL?.trim() || HUGGINGFACE_API_URL,
    model: env.IMAGECRAFT_MODEL?.trim() || DEFAULT_MODEL,
    fallbackModels: readList(env, 'IMAGECRAFT_FALLBACK_MODELS', []),
    defaults,
    limits: LIMITS,
    retry,
    variationSpacingMs: readNumber(env, 'IMAGECRAFT_VARIATION_SPACING_MS', 3000),
    galleryDir: path.resolve(env.IMAGECRAFT_GALLERY_DIR?.trim() || path.join(process.cwd(), '.imagecraft', 'gallery')),
    logLevel: readLogLevel(env),
    port: readNumber(env, 'PORT', 3000),
    allowedOrigins: readList(env, 'ALLOWED_ORIGINS', ['http://localhost:4321', 'http://localhost:3000']),
  };
}

export function findSizePreset(name: string): SizePreset | undefined {
  const needle = name.trim().toLowerCase();
  return IMAGE_SIZES.find(s =>
    s.name.toLowerCase() === needle ||
    s.name.toLowerCase().startsWith(needle + ' ') ||
    `${s.width}x${s.height}` === needle
  );
}
