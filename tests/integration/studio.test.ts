import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
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
} from '../../src/errors.js';
import { GalleryStore } from '../../src/gallery.js';
import { decode } from '../../src/image/processor.js';
import { InferenceClient, type FetchLike } from '../../src/services/inference.js';
import { Studio, describeFailure, successMessage, type StudioEvent } from '../../src/studio.js';
import { testConfig } from '../helpers/config.js';
import { imageResponse, jsonResponse, makePng } from '../helpers/images.js';

function createStudio(dir: string, fetch: FetchLike) {
  const config = testConfig(dir);
  const gallery = new GalleryStore({ dir });
  const client = new InferenceClient({ config, fetch, sleep: async () => {} });
  return { studio: new Studio({ config, client, gallery }), gallery };
}

/** A fetch that hangs until released or aborted. */
function pendingFetch() {
  let release: (res: Response) => void = () => {};
  let markStarted: () => void = () => {};
  const started = new Promise<void>(resolve => { markStarted = resolve; });
  const fetch = vi.fn<FetchLike>((_url, init) =>
    new Promise<Response>((resolve, reject) => {
      release = resolve;
      init.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      markStarted();
    })
  );
  return { fetch, started, release: (res: Response) => release(res) };
}

describe('Studio', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'imagecraft-studio-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('generates, saves and reports the new entries', async () => {
    const png = await makePng(512, 512);
    const { studio, gallery } = createStudio(dir, async () => imageResponse(png));

    const outcome = await studio.generate({ prompt: 'a lighthouse', style: 'Oil Painting' });
    expect(outcome.message).toBe('Image generated successfully!');
    expect(outcome.entries).toHaveLength(1);
    expect(outcome.entries[0]).toMatchObject({ prompt: 'a lighthouse', style: 'Oil Painting', width: 512, height: 512 });

    const listed = await gallery.list();
    expect(listed.map(e => e.id)).toEqual([outcome.entries[0].id]);
    expect(studio.busy).toBe(false);
  });

  it('fits images of another size to the requested one', async () => {
    const png = await makePng(1024, 1024);
    const { studio, gallery } = createStudio(dir, async () => imageResponse(png));

    const { entries } = await studio.generate({ prompt: 'a lighthouse', width: 512, height: 512 });
    const { data } = await gallery.readImage(entries[0].id);
    const saved = await decode(data);
    expect([saved.width, saved.height]).toEqual([512, 512]);
  });

  it('saves nothing when the provider returns a corrupt image', async () => {
    const { studio, gallery } = createStudio(dir, async () => imageResponse(Buffer.from('garbage')));

    await expect(studio.generate({ prompt: 'a lighthouse' })).rejects.toBeInstanceOf(CorruptImageError);
    expect(await gallery.list()).toEqual([]);
  });

  it('saves the images that succeeded and reports the rest', async () => {
    const png = await makePng(512, 512);
    let call = 0;
    const { studio, gallery } = createStudio(dir, async () =>
      call++ === 0 ? imageResponse(png) : jsonResponse(429, { error: 'Rate limit reached' })
    );

    const outcome = await studio.generate({ prompt: 'two boats', variationCount: 2 });
    expect(outcome.entries).toHaveLength(1);
    expect(outcome.entries[0].variationIndex).toBe(0);
    expect(outcome.failures).toEqual([
      { variation: 1, code: 'rate_limit', message: 'Too many requests! Wait 1 minute and try again.' },
    ]);
    expect(outcome.message).toBe('Image generated successfully! 1 could not be generated.');
    expect((await gallery.list()).map(e => e.id)).toEqual([outcome.entries[0].id]);
  });

  it('reports a corrupt image as the failure of its variation', async () => {
    const png = await makePng(512, 512);
    let call = 0;
    const { studio } = createStudio(dir, async () =>
      imageResponse(call++ === 0 ? Buffer.from('garbage') : png)
    );

    const outcome = await studio.generate({ prompt: 'two boats', variationCount: 2 });
    expect(outcome.entries.map(e => e.variationIndex)).toEqual([1]);
    expect(outcome.failures).toEqual([
      {
        variation: 0,
        code: 'corrupt_image',
        message: 'The service returned an image that could not be read. Please try again.',
      },
    ]);
  });

  it('runs one generation at a time', async () => {
    const png = await makePng(512, 512);
    const pending = pendingFetch();
    const { studio } = createStudio(dir, pending.fetch);

    const first = studio.generate({ prompt: 'first' });
    await pending.started;
    expect(studio.busy).toBe(true);
    await expect(studio.generate({ prompt: 'second' })).rejects.toBeInstanceOf(GenerationInProgressError);

    pending.release(imageResponse(png));
    await expect(first).resolves.toMatchObject({ message: 'Image generated successfully!' });
    expect(pending.fetch).toHaveBeenCalledTimes(1);
  });

  it('cancels a pending generation and saves nothing', async () => {
    const pending = pendingFetch();
    const { studio, gallery } = createStudio(dir, pending.fetch);

    const run = studio.generate({ prompt: 'never mind' });
    await pending.started;
    expect(studio.cancel()).toBe(true);

    await expect(run).rejects.toBeInstanceOf(CancelledError);
    expect(await gallery.list()).toEqual([]);
    expect(studio.busy).toBe(false);
    expect(studio.cancel()).toBe(false);
  });

  it('follows an external abort signal', async () => {
    const pending = pendingFetch();
    const { studio } = createStudio(dir, pending.fetch);
    const controller = new AbortController();

    const run = studio.generate({ prompt: 'never mind' }, { signal: controller.signal });
    await pending.started;
    controller.abort();

    await expect(run).rejects.toBeInstanceOf(CancelledError);
  });

  it('streams progress events', async () => {
    const png = await makePng(512, 512);
    const { studio } = createStudio(dir, async () => imageResponse(png));

    const events: StudioEvent[] = [];
    for await (const event of studio.stream({ prompt: 'a lighthouse', variationCount: 2, seed: 5 })) {
      events.push(event);
    }

    expect(events.map(e => e.type)).toEqual([
      'generation:started',
      'generation:attempt',
      'generation:attempt',
      'generation:saved',
    ]);
    const saved = events[3];
    expect(saved).toMatchObject({ message: '2 images created successfully!', failures: [] });
  });

  it('streams failures as an error event', async () => {
    const { studio } = createStudio(dir, async () => imageResponse(Buffer.from('garbage')));

    const events: StudioEvent[] = [];
    for await (const event of studio.stream({ prompt: 'a lighthouse', style: 'Vaporwave' })) {
      events.push(event);
    }

    expect(events).toEqual([
      { type: 'generation:error', code: 'unknown_style', message: 'Unknown style "Vaporwave". Pick one of the listed styles.' },
    ]);
  });
});

describe('describeFailure', () => {
  it('gives each failure its own message', () => {
    expect(describeFailure(new AuthenticationError('nope'))).toBe(
      'API key is missing or invalid! Check HUGGINGFACE_API_KEY or get a new token from Hugging Face.'
    );
    expect(describeFailure(new RateLimitError('slow down'))).toBe('Too many requests! Wait 1 minute and try again.');
    expect(describeFailure(new TransientUnavailableError('loading', 3))).toBe(
      'The model is still loading after 3 attempt(s). Please wait 30 seconds and try again.'
    );
    expect(describeFailure(new InvalidParameterError('steps must be between 15 and 50'))).toBe(
      'Invalid request: steps must be between 15 and 50'
    );
    expect(describeFailure(new UnknownStyleError('Vaporwave'))).toBe('Unknown style "Vaporwave". Pick one of the listed styles.');
    expect(describeFailure(new NotFoundError('img_x'))).toBe('That image is no longer in the gallery.');
    expect(describeFailure(new CancelledError())).toBe('Generation cancelled.');
    expect(describeFailure(new ConfigurationError('bad port'))).toBe('Configuration error: bad port');
    expect(describeFailure(new Error('boom'))).toBe('Could not generate image. Please try again later.');
    expect(describeFailure(new Error('boom'), 'Gallery unavailable.')).toBe('Gallery unavailable.');
  });
});

describe('successMessage', () => {
  it('counts images', () => {
    expect(successMessage(1)).toBe('Image generated successfully!');
    expect(successMessage(3)).toBe('3 images created successfully!');
    expect(successMessage(2, 1)).toBe('2 images created successfully! 1 could not be generated.');
  });
});
