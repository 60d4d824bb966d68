import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config.js';
import { InvalidParameterError, UnknownStyleError } from '../../src/errors.js';
import { buildRequest, parseGenerationInput, type GenerationInput } from '../../src/request.js';
import { styleCatalog } from '../../src/styles.js';

const config = loadConfig({});

describe('buildRequest', () => {
  it('fills in defaults', () => {
    expect(buildRequest({ prompt: '  a lighthouse at dusk ' }, config, styleCatalog)).toEqual({
      prompt: 'a lighthouse at dusk',
      style: 'Photorealistic',
      width: 512,
      height: 512,
      steps: 25,
      guidanceScale: 7.5,
      variationCount: 1,
      negativePrompt: undefined,
      seed: undefined,
    });
  });

  it('resolves size presets unless explicit dimensions are given', () => {
    const portrait = buildRequest({ prompt: 'cat', size: 'portrait' }, config, styleCatalog);
    expect([portrait.width, portrait.height]).toEqual([512, 768]);

    const explicit = buildRequest({ prompt: 'cat', size: 'portrait', width: 768, height: 512 }, config, styleCatalog);
    expect([explicit.width, explicit.height]).toEqual([768, 512]);

    expect(() => buildRequest({ prompt: 'cat', size: 'poster' }, config, styleCatalog)).toThrow(InvalidParameterError);
  });

  it('drops a blank negative prompt', () => {
    expect(buildRequest({ prompt: 'cat', negativePrompt: '   ' }, config, styleCatalog).negativePrompt).toBeUndefined();
  });

  const invalid: [string, GenerationInput][] = [
    ['empty prompt', { prompt: '   ' }],
    ['width below range', { prompt: 'cat', width: 128, height: 512 }],
    ['width not a multiple of 8', { prompt: 'cat', width: 500, height: 512 }],
    ['too many steps', { prompt: 'cat', steps: 51 }],
    ['fractional steps', { prompt: 'cat', steps: 20.5 }],
    ['guidance too low', { prompt: 'cat', guidanceScale: 0.5 }],
    ['too many variations', { prompt: 'cat', variationCount: 5 }],
    ['zero variations', { prompt: 'cat', variationCount: 0 }],
    ['negative seed', { prompt: 'cat', seed: -1 }],
  ];

  it.each(invalid)('rejects %s', (_label, input) => {
    expect(() => buildRequest(input, config, styleCatalog)).toThrow(InvalidParameterError);
  });

  it('rejects an unknown style', () => {
    expect(() => buildRequest({ prompt: 'cat', style: 'Vaporwave' }, config, styleCatalog)).toThrow(UnknownStyleError);
  });
});

describe('parseGenerationInput', () => {
  it('reads strings and numeric strings', () => {
    expect(parseGenerationInput({ prompt: 'cat', style: 'Anime', steps: '30', seed: 7, size: null })).toEqual({
      prompt: 'cat',
      style: 'Anime',
      size: undefined,
      width: undefined,
      height: undefined,
      steps: 30,
      guidanceScale: undefined,
      variationCount: undefined,
      negativePrompt: undefined,
      seed: 7,
    });
  });

  it('requires a prompt', () => {
    expect(() => parseGenerationInput({})).toThrow('prompt required');
    expect(() => parseGenerationInput({ prompt: ' ' })).toThrow('prompt required');
    expect(() => parseGenerationInput(null)).toThrow(InvalidParameterError);
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseGenerationInput({ prompt: 'cat', steps: 'many' })).toThrow('steps must be a number');
    expect(() => parseGenerationInput({ prompt: 'cat', style: 3 })).toThrow('style must be a string');
  });
});
