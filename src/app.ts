import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { IMAGE_SIZES } from './config.js';
import { isImagecraftError } from './errors.js';
import { isValidEntryId } from './gallery.js';
import { packageArchive, type ArchiveItem } from './image/archive.js';
import { decode, encode, isImageFormat, prepareDownload, thumbnail, MIME_TYPES } from './image/processor.js';
import { createLogger } from './logger.js';
import { parseGenerationInput } from './request.js';
import { GENERATION_FAILED, Studio, describeFailure } from './studio.js';
import type { GalleryEntry } from './types.js';

const log = createLogger('Api');

const GALLERY_FAILED = 'The gallery could not be read or updated. Please try again.';

export interface AppOptions {
  studio: Studio;
  allowedOrigins: string[];
}

/** Entry as the API exposes it: no server paths, an image URL instead. */
export function toPublicEntry(entry: GalleryEntry) {
  const { imagePath: _imagePath, ...rest } = entry;
  return {
    ...rest,
    imageUrl: `/api/gallery/${entry.id}/image`,
    thumbnailUrl: `/api/gallery/${entry.id}/thumbnail`,
  };
}

function fail(c: Context, err: unknown, fallback = GALLERY_FAILED) {
  if (isImagecraftError(err)) {
    return c.json({ error: describeFailure(err, fallback), code: err.code, detail: err.message }, err.status);
  }
  log.error('unexpected error:', err);
  return c.json({ error: describeFailure(err, fallback), code: 'unknown' }, 500);
}

function timestamp(): string {
  return new Date().toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
}

export function createApp({ studio, allowedOrigins }: AppOptions): Hono {
  const app = new Hono();
  const { gallery, catalog, client } = studio;

  app.use('/*', cors({ origin: allowedOrigins }));

  app.get('/api/styles', (c) =>
    c.json({ defaultStyle: catalog.defaultStyle, styles: [...catalog.list()] })
  );

  app.get('/api/sizes', (c) => c.json([...IMAGE_SIZES]));

  app.get('/api/status', (c) => c.json({ ...client.checkConnection(), busy: studio.busy }));

  app.post('/api/generate', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    try {
      const input = parseGenerationInput(body);
      const outcome = await studio.generate(input, { signal: c.req.raw.signal });
      return c.json({
        message: outcome.message,
        entries: outcome.entries.map(toPublicEntry),
        failures: outcome.failures,
      });
    } catch (err) {
      return fail(c, err, GENERATION_FAILED);
    }
  });

  app.post('/api/generate/cancel', (c) => c.json({ cancelled: studio.cancel() }));

  app.get('/api/gallery', async (c) => {
    try {
      const entries = c.req.query('favorites') ? await gallery.favorites() : await gallery.list();
      return c.json(entries.map(toPublicEntry));
    } catch (err) {
      return fail(c, err);
    }
  });

  app.delete('/api/gallery', async (c) => {
    try {
      return c.json({ deleted: await gallery.clear() });
    } catch (err) {
      return fail(c, err);
    }
  });

  app.get('/api/gallery/archive', async (c) => {
    try {
      const entries = c.req.query('favorites') ? await gallery.favorites() : await gallery.list();
      const items: ArchiveItem[] = [];
      for (const entry of entries) {
        const { data } = await gallery.readImage(entry.id);
        items.push({ image: data, prompt: entry.prompt, style: entry.style, seed: entry.seed, createdAt: entry.createdAt });
      }
      const zip = await packageArchive(items);
      return new Response(new Uint8Array(zip), {
        headers: {
          'Content-Type': 'application/zip',
          'Content-Disposition': `attachment; filename="imagecraft_${timestamp()}.zip"`,
        },
      });
    } catch (err) {
      return fail(c, err);
    }
  });

  app.get('/api/gallery/:id', async (c) => {
    const id = c.req.param('id');
    if (!isValidEntryId(id)) return c.json({ error: 'invalid id' }, 400);
    try {
      return c.json(toPublicEntry(await gallery.get(id)));
    } catch (err) {
      return fail(c, err);
    }
  });

  app.get('/api/gallery/:id/image', async (c) => {
    const id = c.req.param('id');
    if (!isValidEntryId(id)) return c.json({ error: 'invalid id' }, 400);
    const format = c.req.query('format') ?? 'png';
    if (!isImageFormat(format)) return c.json({ error: `unsupported format: ${format}` }, 400);

    try {
      const { data } = await gallery.readImage(id);
      const payload = await prepareDownload(data, format);
      return new Response(new Uint8Array(payload.data), {
        headers: {
          'Content-Type': payload.mimeType,
          'Content-Disposition': `inline; filename="${id}.${payload.extension}"`,
        },
      });
    } catch (err) {
      return fail(c, err);
    }
  });

  app.get('/api/gallery/:id/thumbnail', async (c) => {
    const id = c.req.param('id');
    if (!isValidEntryId(id)) return c.json({ error: 'invalid id' }, 400);
    try {
      const { data } = await gallery.readImage(id);
      const thumb = await encode(thumbnail(await decode(data)), 'png');
      return new Response(new Uint8Array(thumb), { headers: { 'Content-Type': MIME_TYPES.png } });
    } catch (err) {
      return fail(c, err);
    }
  });

  app.post('/api/gallery/:id/favorite', async (c) => {
    const id = c.req.param('id');
    if (!isValidEntryId(id)) return c.json({ error: 'invalid id' }, 400);
    try {
      return c.json({ id, favorite: await gallery.toggleFavorite(id) });
    } catch (err) {
      return fail(c, err);
    }
  });

  app.delete('/api/gallery/:id', async (c) => {
    const id = c.req.param('id');
    if (!isValidEntryId(id)) return c.json({ error: 'invalid id' }, 400);
    try {
      await gallery.delete(id);
      return c.json({ deleted: id });
    } catch (err) {
      return fail(c, err);
    }
  });

  return app;
}
