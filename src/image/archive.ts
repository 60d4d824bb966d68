import JSZip from 'jszip';
import { EXTENSIONS, encode, sniffFormat, type ImageFormat, type RasterImage } from './processor.js';

export interface ArchiveItem {
  /** A decoded image, or bytes that are already encoded. */
  image: RasterImage | Uint8Array;
  prompt?: string;
  style?: string;
  seed?: number;
  createdAt?: Date | string;
}

export interface ArchiveOptions {
  /** Format decoded images are encoded to. Encoded bytes are stored as they are. */
  format?: ImageFormat;
}

export const INFO_FILE = 'generation_info.txt';

const INVALID_NAME_CHARS = /[<>:"/\\|?*]/g;

export function archiveFileName(index: number, prompt: string | undefined, extension: string): string {
  const short = (prompt ?? '').slice(0, 30).replace(INVALID_NAME_CHARS, '').trim() || 'image';
  return `${String(index + 1).padStart(2, '0')}_${short}.${extension}`;
}

function buildInfo(items: ArchiveItem[]): string {
  let text = 'imagecraft - Generation Info\n';
  text += '='.repeat(50) + '\n\n';
  items.forEach((item, index) => {
    const created = item.createdAt === undefined ? 'Not specified' : new Date(item.createdAt).toISOString();
    text += `Image ${index + 1}:\n`;
    text += `  Prompt: ${item.prompt ?? ''}\n`;
    text += `  Style: ${item.style ?? ''}\n`;
    text += `  Seed: ${item.seed ?? 'Not specified'}\n`;
    text += `  Created: ${created}\n\n`;
  });
  return text;
}

/**
 * Packs images into one ZIP in input order, with a generation_info.txt
 * describing them. No items yields a valid ZIP with no entries.
 */
export async function packageArchive(items: ArchiveItem[], options: ArchiveOptions = {}): Promise<Buffer> {
  const format = options.format ?? 'png';
  const zip = new JSZip();

  for (const [index, item] of items.entries()) {
    let data: Uint8Array;
    let extension: string;
    if (item.image instanceof Uint8Array) {
      const sniffed = sniffFormat(item.image);
      data = item.image;
      extension = sniffed === null ? 'bin' : sniffed === 'gif' ? 'gif' : EXTENSIONS[sniffed];
    } else {
      data = await encode(item.image, format);
      extension = EXTENSIONS[format];
    }
    zip.file(archiveFileName(index, item.prompt, extension), data);
  }

  if (items.length > 0) {
    zip.file(INFO_FILE, buildInfo(items));
  }

  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}
