import fs from 'node:fs/promises';
import path from 'node:path';
import { randomBytes, randomUUID } from 'node:crypto';
import { NotFoundError } from './errors.js';
import { createLogger } from './logger.js';
import { EXTENSIONS, sniffFormat } from './image/processor.js';
import type { GalleryEntry, GenerationResult } from './types.js';

const log = createLogger('Gallery');

export type IdGenerator = (createdAt: Date) => string;

export interface GalleryStoreOptions {
  dir: string;
  idGenerator?: IdGenerator;
  /** How many fresh ids to try before giving up on a collision streak. */
  maxIdAttempts?: number;
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

const pad = (n: number) => String(n).padStart(2, '0');

export const defaultIdGenerator: IdGenerator = (createdAt) => {
  const d = createdAt;
  const stamp = `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
    `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`;
  return `img_${stamp}_${randomBytes(4).toString('hex')}`;
};

const ENTRY_ID = /^img_[A-Za-z0-9_-]{1,64}$/;

/** Ids are `img_` plus letters, digits, `_` or `-`, so an id never escapes the gallery directory. */
export function isValidEntryId(id: string): boolean {
  return ENTRY_ID.test(id);
}

function parseEntry(raw: unknown): GalleryEntry | null {
  if (!raw || typeof raw !== 'object') return null;
  const r: Partial<Record<keyof GalleryEntry, unknown>> = { ...raw };
  const str = (v: unknown) => (typeof v === 'string' ? v : undefined);
  const num = (v: unknown) => (typeof v === 'number' && Number.isFinite(v) ? v : undefined);

  const id = str(r.id);
  const imagePath = str(r.imagePath);
  const prompt = str(r.prompt);
  const style = str(r.style);
  const createdAt = str(r.createdAt);
  const width = num(r.width);
  const height = num(r.height);
  const steps = num(r.steps);
  const guidanceScale = num(r.guidanceScale);
  if (
    id === undefined || imagePath === undefined || prompt === undefined || style === undefined ||
    createdAt === undefined || Number.isNaN(Date.parse(createdAt)) ||
    width === undefined || height === undefined || steps === undefined || guidanceScale === undefined
  ) {
    return null;
  }

  return {
    id,
    imagePath,
    prompt,
    style,
    createdAt,
    negativePrompt: str(r.negativePrompt),
    seed: num(r.seed),
    width,
    height,
    steps,
    guidanceScale,
    variationIndex: num(r.variationIndex) ?? 0,
    favorite: r.favorite === true,
  };
}

/** Null for a sidecar that is not JSON or lacks required fields. */
function parseSidecar(content: string): GalleryEntry | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }
  return parseEntry(raw);
}

function compareEntries(a: GalleryEntry, b: GalleryEntry): number {
  return (
    Date.parse(b.createdAt) - Date.parse(a.createdAt) ||
    a.variationIndex - b.variationIndex ||
    a.id.localeCompare(b.id)
  );
}

/**
 * Images and their metadata on local disk: `<id>.<ext>` plus a `<id>.json` sidecar.
 * The store is the only writer of its directory.
 */
export class GalleryStore {
  readonly dir: string;
  private readonly idGenerator: IdGenerator;
  private readonly maxIdAttempts: number;

  constructor(options: GalleryStoreOptions) {
    this.dir = path.resolve(options.dir);
    this.idGenerator = options.idGenerator ?? defaultIdGenerator;
    this.maxIdAttempts = options.maxIdAttempts ?? 10;
  }

  private sidecarPath(id: string) {
    return path.join(this.dir, `${id}.json`);
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await fs.access(file);
      return true;
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return false;
      throw err;
    }
  }

  /** Write-then-rename so readers never see a partial file. */
  private async writeAtomic(target: string, data: string | Uint8Array): Promise<void> {
    const tmp = path.join(this.dir, `.${path.basename(target)}.${randomUUID()}.tmp`);
    await fs.writeFile(tmp, data);
    try {
      await fs.rename(tmp, target);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }

  private async reserveId(createdAt: Date, extension: string): Promise<string> {
    for (let i = 0; i < this.maxIdAttempts; i++) {
      const id = this.idGenerator(createdAt);
      if (!isValidEntryId(id)) {
        throw new Error(`Id generator produced an invalid id: "${id}"`);
      }
      const taken = await this.exists(this.sidecarPath(id)) ||
        await this.exists(path.join(this.dir, `${id}.${extension}`));
      if (!taken) return id;
      log.debug(`id collision on ${id}, regenerating`);
    }
    throw new Error(`Could not allocate a unique gallery id after ${this.maxIdAttempts} attempts`);
  }

  async save(result: GenerationResult): Promise<GalleryEntry[]> {
    await fs.mkdir(this.dir, { recursive: true });
    const { request } = result;
    const entries: GalleryEntry[] = [];

    for (const image of result.images) {
      const format = sniffFormat(image.data);
      const extension = format === null ? 'bin' : format === 'gif' ? 'gif' : EXTENSIONS[format];
      const id = await this.reserveId(result.createdAt, extension);
      const imagePath = path.join(this.dir, `${id}.${extension}`);

      const entry: GalleryEntry = {
        id,
        imagePath,
        prompt: request.prompt,
        style: request.style,
        createdAt: result.createdAt.toISOString(),
        negativePrompt: request.negativePrompt,
        seed: image.seed,
        width: request.width,
        height: request.height,
        steps: request.steps,
        guidanceScale: request.guidanceScale,
        variationIndex: image.variation,
        favorite: false,
      };

      await this.writeAtomic(imagePath, image.data);
      // Sidecar last: an entry is only listed once its image is in place
      await this.writeAtomic(this.sidecarPath(id), JSON.stringify(entry, null, 2));
      entries.push(entry);
    }

    log.info(`saved ${entries.length} image(s) to ${this.dir}`);
    return entries;
  }

  private async readDir(): Promise<string[]> {
    try {
      return await fs.readdir(this.dir);
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return [];
      throw err;
    }
  }

  async list(): Promise<GalleryEntry[]> {
    const entries: GalleryEntry[] = [];
    for (const file of await this.readDir()) {
      if (!file.endsWith('.json') || file.startsWith('.')) continue;
      try {
        const entry = parseSidecar(await fs.readFile(path.join(this.dir, file), 'utf-8'));
        if (!entry) {
          log.warn(`skipping malformed sidecar: ${file}`);
          continue;
        }
        entries.push(this.locate(entry));
      } catch (err) {
        if (isNodeError(err) && err.code === 'ENOENT') continue;
        log.warn(`skipping unreadable sidecar: ${file}`, err);
      }
    }
    return entries.sort(compareEntries);
  }

  private locate(entry: GalleryEntry): GalleryEntry {
    return { ...entry, imagePath: path.join(this.dir, path.basename(entry.imagePath)) };
  }

  /** Throws `NotFoundError` when there is no sidecar; null when it cannot be parsed. */
  private async readSidecar(id: string): Promise<GalleryEntry | null> {
    if (!isValidEntryId(id)) throw new NotFoundError(id);
    let content: string;
    try {
      content = await fs.readFile(this.sidecarPath(id), 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') throw new NotFoundError(id);
      throw err;
    }
    const entry = parseSidecar(content);
    return entry && this.locate(entry);
  }

  async get(id: string): Promise<GalleryEntry> {
    const entry = await this.readSidecar(id);
    if (!entry) throw new NotFoundError(id);
    return entry;
  }

  async readImage(id: string): Promise<{ entry: GalleryEntry; data: Buffer }> {
    const entry = await this.get(id);
    try {
      return { entry, data: await fs.readFile(entry.imagePath) };
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') throw new NotFoundError(id);
      throw err;
    }
  }

  /**
   * Removes image and metadata. Throws `NotFoundError` for an id that is not stored.
   * An entry whose sidecar cannot be parsed is removed with every `<id>.*` file.
   */
  async delete(id: string): Promise<void> {
    const entry = await this.readSidecar(id);
    if (entry) {
      await fs.rm(this.sidecarPath(id));
      await fs.rm(entry.imagePath, { force: true });
    } else {
      log.warn(`removing ${id} with an unreadable sidecar`);
      await this.removeFiles(id);
    }
    log.info(`deleted ${id}`);
  }

  private async removeFiles(id: string): Promise<void> {
    const owned = (await this.readDir()).filter(file => !file.startsWith('.') && path.parse(file).name === id);
    for (const file of owned) {
      await fs.rm(path.join(this.dir, file), { force: true });
    }
  }

  async toggleFavorite(id: string): Promise<boolean> {
    const entry = await this.get(id);
    const updated: GalleryEntry = { ...entry, favorite: !entry.favorite };
    await this.writeAtomic(this.sidecarPath(id), JSON.stringify(updated, null, 2));
    return updated.favorite;
  }

  async favorites(): Promise<GalleryEntry[]> {
    return (await this.list()).filter(e => e.favorite);
  }

  async size(): Promise<number> {
    return (await this.list()).length;
  }

  /** Deletes every entry, unreadable ones included; returns how many were removed. */
  async clear(): Promise<number> {
    let removed = 0;
    for (const file of await this.readDir()) {
      const id = path.basename(file, '.json');
      if (!file.endsWith('.json') || !isValidEntryId(id)) continue;
      try {
        await this.delete(id);
        removed++;
      } catch (err) {
        if (err instanceof NotFoundError) continue;
        throw err;
      }
    }
    return removed;
  }
}
