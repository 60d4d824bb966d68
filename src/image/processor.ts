import { createCanvas, loadImage, type Canvas } from '@napi-rs/canvas';
import { CorruptImageError, errorMessage } from '../errors.js';

export type ImageFormat = 'png' | 'jpeg' | 'webp';
type SniffedFormat = ImageFormat | 'gif';

export const MIME_TYPES: Record<ImageFormat, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
};

export const EXTENSIONS: Record<ImageFormat, string> = {
  png: 'png',
  jpeg: 'jpg',
  webp: 'webp',
};

/**
 * A decoded image held on a canvas, ready to be resized or re-encoded.
 */
export interface RasterImage {
  readonly width: number;
  readonly height: number;
  /** Format of the bytes it was decoded from. */
  readonly sourceFormat: SniffedFormat;
  readonly canvas: Canvas;
}

export interface ImageInfo {
  width: number;
  height: number;
  megapixels: number;
  aspectRatio: number;
  sizeText: string;
}

export interface DownloadPayload {
  data: Buffer;
  mimeType: string;
  extension: string;
}

const round2 = (n: number) => Math.round(n * 100) / 100;

/** Identifies an image by its leading bytes. */
export function sniffFormat(bytes: Uint8Array): SniffedFormat | null {
  if (bytes.length >= 8 &&
    bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47 &&
    bytes[4] === 0x0d && bytes[5] === 0x0a && bytes[6] === 0x1a && bytes[7] === 0x0a) {
    return 'png';
  }
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return 'jpeg';
  }
  if (bytes.length >= 12 &&
    Buffer.from(bytes.subarray(0, 4)).toString('ascii') === 'RIFF' &&
    Buffer.from(bytes.subarray(8, 12)).toString('ascii') === 'WEBP') {
    return 'webp';
  }
  if (bytes.length >= 6 && Buffer.from(bytes.subarray(0, 3)).toString('ascii') === 'GIF') {
    return 'gif';
  }
  return null;
}

function fromCanvas(canvas: Canvas, sourceFormat: SniffedFormat): RasterImage {
  return Object.freeze({ width: canvas.width, height: canvas.height, sourceFormat, canvas });
}

export async function decode(blob: Uint8Array): Promise<RasterImage> {
  const format = sniffFormat(blob);
  if (!format) {
    throw new CorruptImageError(`Unrecognized image data (${blob.length} bytes)`);
  }

  let img: Awaited<ReturnType<typeof loadImage>>;
  try {
    img = await loadImage(Buffer.from(blob));
  } catch (err) {
    throw new CorruptImageError(`Could not decode ${format} image: ${errorMessage(err)}`, { cause: err });
  }
  if (!img.width || !img.height) {
    throw new CorruptImageError(`Decoded ${format} image has no pixels`);
  }

  const canvas = createCanvas(img.width, img.height);
  canvas.getContext('2d').drawImage(img, 0, 0);
  return fromCanvas(canvas, format);
}

export async function encode(image: RasterImage, format: ImageFormat = 'png', quality = 90): Promise<Buffer> {
  switch (format) {
    case 'png':
      return image.canvas.encode('png');
    case 'webp':
      return image.canvas.encode('webp', quality);
    case 'jpeg': {
      // JPEG has no alpha channel; flatten onto white.
      const flat = createCanvas(image.width, image.height);
      const ctx = flat.getContext('2d');
      ctx.fillStyle = 'white';
      ctx.fillRect(0, 0, image.width, image.height);
      ctx.drawImage(image.canvas, 0, 0);
      return flat.encode('jpeg', quality);
    }
  }
}

/**
 * Target size for a resize. With `keepAspect` the result fits inside the box.
 */
export function fitDimensions(
  width: number,
  height: number,
  targetWidth: number,
  targetHeight: number,
  keepAspect = true,
): { width: number; height: number } {
  if (!keepAspect) return { width: targetWidth, height: targetHeight };

  const ratio = width / height;
  const targetRatio = targetWidth / targetHeight;
  if (ratio > targetRatio) {
    return { width: targetWidth, height: Math.max(1, Math.floor(targetWidth / ratio)) };
  }
  return { width: Math.max(1, Math.floor(targetHeight * ratio)), height: targetHeight };
}

export function resize(
  image: RasterImage,
  width: number,
  height: number,
  options: { keepAspect?: boolean } = {},
): RasterImage {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new RangeError(`Invalid resize target ${width}x${height}`);
  }
  const size = fitDimensions(image.width, image.height, width, height, options.keepAspect ?? true);
  const canvas = createCanvas(size.width, size.height);
  const ctx = canvas.getContext('2d');
  ctx.imageSmoothingEnabled = true;
  ctx.imageSmoothingQuality = 'high';
  ctx.drawImage(image.canvas, 0, 0, size.width, size.height);
  return fromCanvas(canvas, image.sourceFormat);
}

/** Scales down to fit `maxSize`; never scales up. */
export function thumbnail(image: RasterImage, maxSize = 256): RasterImage {
  if (image.width <= maxSize && image.height <= maxSize) return image;
  return resize(image, maxSize, maxSize, { keepAspect: true });
}

export function imageInfo(image: RasterImage): ImageInfo {
  const { width, height } = image;
  return {
    width,
    height,
    megapixels: round2((width * height) / 1_000_000),
    aspectRatio: round2(width / height),
    sizeText: `${width}x${height}`,
  };
}

export async function prepareDownload(bytes: Uint8Array, format: ImageFormat = 'png', quality = 95): Promise<DownloadPayload> {
  const image = await decode(bytes);
  return {
    data: await encode(image, format, quality),
    mimeType: MIME_TYPES[format],
    extension: EXTENSIONS[format],
  };
}

export function isImageFormat(value: string): value is ImageFormat {
  return value === 'png' || value === 'jpeg' || value === 'webp';
}
