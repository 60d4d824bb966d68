import { describe, it, expect } from 'vitest';
import { DEFAULT_STYLE, STYLE_PRESETS, createStyleCatalog, styleCatalog } from '../../src/styles.js';
import { UnknownStyleError } from '../../src/errors.js';

describe('styleCatalog', () => {
  it('resolves every preset to a non-empty suffix', () => {
    expect(styleCatalog.names()).toHaveLength(10);
    for (const name of styleCatalog.names()) {
      expect(styleCatalog.resolve(name).length).toBeGreaterThan(0);
    }
  });

  it('has the default style', () => {
    expect(styleCatalog.defaultStyle).toBe(DEFAULT_STYLE);
    expect(styleCatalog.has('Photorealistic')).toBe(true);
  });

  it('throws UnknownStyleError for an unknown name', () => {
    expect(() => styleCatalog.resolve('Vaporwave')).toThrow(UnknownStyleError);
    expect(() => styleCatalog.get('anime')).toThrow(UnknownStyleError);
  });

  it('appends the style suffix to the trimmed prompt', () => {
    expect(styleCatalog.buildPrompt('  a red fox ', 'Sketch')).toBe(
      'a red fox, pencil sketch, hand drawn, graphite, black and white, shading, artistic sketch'
    );
  });

  it('merges the style and user negative prompts', () => {
    expect(styleCatalog.buildNegativePrompt('Sketch')).toBe('color, painted, digital, photo, blurry');
    expect(styleCatalog.buildNegativePrompt('Sketch', ' text ')).toBe('color, painted, digital, photo, blurry, text');

    const bare = createStyleCatalog([{ name: 'Plain', promptSuffix: ', plain', negativePrompt: '', description: '' }]);
    expect(bare.buildNegativePrompt('Plain', 'text')).toBe('text');
    expect(bare.buildNegativePrompt('Plain')).toBe('');
  });

  it('does not let callers mutate presets', () => {
    expect(Object.isFrozen(styleCatalog.get('Anime'))).toBe(true);
    expect(Object.isFrozen(styleCatalog.list())).toBe(true);
  });

  it('rejects duplicate presets and an unknown default', () => {
    expect(() => createStyleCatalog([STYLE_PRESETS[0], STYLE_PRESETS[0]])).toThrow(/Duplicate/);
    expect(() => createStyleCatalog(STYLE_PRESETS, 'Nope')).toThrow(UnknownStyleError);
  });
});
