import { UnknownStyleError } from './errors.js';
import type { StylePreset } from './types.js';

export const STYLE_PRESETS: readonly StylePreset[] = [
  {
    name: 'Photorealistic',
    promptSuffix: ', photorealistic, ultra detailed, sharp focus, high resolution, 8k, professional photography, natural lighting',
    negativePrompt: 'cartoon, anime, drawing, painting, blurry, low quality, distorted',
    description: 'Detailed images that look like real photographs',
  },
  {
    name: 'Digital Art',
    promptSuffix: ', digital art, digital painting, artstation, concept art, smooth, vibrant colors',
    negativePrompt: 'photo, photograph, blurry, noisy, grainy, low quality',
    description: 'Modern digital illustration style',
  },
  {
    name: 'Oil Painting',
    promptSuffix: ', oil painting, classical art, brush strokes, canvas texture, traditional art, masterpiece',
    negativePrompt: 'digital, photo, modern, cartoon, anime, blurry',
    description: 'Classical oil painting appearance',
  },
  {
    name: 'Watercolor',
    promptSuffix: ', watercolor painting, soft colors, flowing, delicate, paper texture, artistic',
    negativePrompt: 'digital, photo, sharp edges, bold lines, cartoon',
    description: 'Soft and flowing watercolor effect',
  },
  {
    name: 'Comic Book',
    promptSuffix: ', comic book style, bold lines, cel shading, dynamic, colorful, superhero comic',
    negativePrompt: 'realistic, photo, blurry, soft, watercolor',
    description: 'Comic book and graphic novel style',
  },
  {
    name: 'Anime',
    promptSuffix: ', anime style, manga, japanese animation, cel shaded, vibrant, detailed eyes, studio ghibli',
    negativePrompt: 'realistic, photo, western cartoon, blurry, low quality',
    description: 'Japanese anime and manga style',
  },
  {
    name: 'Minimalist',
    promptSuffix: ', minimalist, simple, clean lines, geometric, limited colors, modern design, flat design',
    negativePrompt: 'complex, detailed, busy, cluttered, realistic, photo',
    description: 'Clean and simple minimalist design',
  },
  {
    name: 'Abstract',
    promptSuffix: ', abstract art, non-representational, shapes, colors, emotional, expressionist, modern art',
    negativePrompt: 'realistic, photo, detailed, figurative, portrait',
    description: 'Abstract and artistic expression',
  },
  {
    name: '3D Render',
    promptSuffix: ', 3d render, octane render, cinema 4d, blender, realistic lighting, ray tracing, pixar style',
    negativePrompt: '2d, flat, drawing, sketch, painting, blurry',
    description: '3D modeling and render appearance',
  },
  {
    name: 'Sketch',
    promptSuffix: ', pencil sketch, hand drawn, graphite, black and white, shading, artistic sketch',
    negativePrompt: 'color, painted, digital, photo, blurry',
    description: 'Charcoal sketch and drawing style',
  },
];

export const DEFAULT_STYLE = 'Photorealistic';

export interface StyleCatalog {
  readonly defaultStyle: string;
  /** Prompt suffix for `name`; throws `UnknownStyleError` otherwise. */
  resolve(name: string): string;
  get(name: string): StylePreset;
  has(name: string): boolean;
  names(): string[];
  list(): readonly StylePreset[];
  buildPrompt(prompt: string, style: string): string;
  buildNegativePrompt(style: string, userNegative?: string): string;
}

export function createStyleCatalog(
  presets: readonly StylePreset[],
  defaultStyle: string = presets[0]?.name ?? '',
): StyleCatalog {
  const table = new Map<string, StylePreset>();
  for (const preset of presets) {
    if (table.has(preset.name)) {
      throw new Error(`Duplicate style preset: ${preset.name}`);
    }
    table.set(preset.name, Object.freeze({ ...preset }));
  }
  if (!table.has(defaultStyle)) {
    throw new UnknownStyleError(defaultStyle);
  }
  const frozen = Object.freeze([...table.values()]);

  const get = (name: string): StylePreset => {
    const preset = table.get(name);
    if (!preset) throw new UnknownStyleError(name);
    return preset;
  };

  return Object.freeze({
    defaultStyle,
    resolve: (name: string) => get(name).promptSuffix,
    get,
    has: (name: string) => table.has(name),
    names: () => [...table.keys()],
    list: () => frozen,
    buildPrompt: (prompt: string, style: string) => prompt.trim() + get(style).promptSuffix,
    buildNegativePrompt: (style: string, userNegative = '') => {
      const styleNegative = get(style).negativePrompt;
      const user = userNegative.trim();
      if (user && styleNegative) return `${styleNegative}, ${user}`;
      return user || styleNegative;
    },
  });
}

export const styleCatalog = createStyleCatalog(STYLE_PRESETS, DEFAULT_STYLE);
