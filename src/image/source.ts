import sharp from "sharp";
import bmp from "bmp-js";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { SourceError } from "../errors.js";
import type { ImageIntrinsics } from "../schema/plan.js";

/** Reads the pixel size and capture orientation of an image file */
export type IntrinsicsReader = (source: string) => Promise<ImageIntrinsics>;

function cannotRead(source: string, err: unknown): SourceError {
  const detail = err instanceof Error ? err.message : String(err);
  return new SourceError(`Cannot read image ${path.basename(source)}: ${detail}`, source);
}

function isBitmap(source: string): boolean {
  return path.extname(source).toLowerCase() === ".bmp";
}

/**
 * Decode a BMP file into a raw RGB sharp pipeline. libvips has no BMP
 * loader; bmp-js yields ABGR pixels, so the alpha byte is dropped.
 */
async function openBitmap(source: string): Promise<sharp.Sharp> {
  const decoded = bmp.decode(await fs.readFile(source));
  const { width, height, data } = decoded;
  const rgb = Buffer.alloc(width * height * 3);
  for (let i = 0, j = 0; j < rgb.length; i += 4, j += 3) {
    rgb[j] = data[i + 3] ?? 0;
    rgb[j + 1] = data[i + 2] ?? 0;
    rgb[j + 2] = data[i + 1] ?? 0;
  }
  return sharp(rgb, { raw: { width, height, channels: 3 } });
}

async function openSource(source: string): Promise<sharp.Sharp> {
  if (!isBitmap(source)) return sharp(source);
  try {
    return await openBitmap(source);
  } catch (err) {
    throw cannotRead(source, err);
  }
}

/**
 * Read stored pixel dimensions and the EXIF orientation tag.
 * Dimensions are as stored, before any orientation is applied.
 */
export const readIntrinsics: IntrinsicsReader = async (source) => {
  let meta: sharp.Metadata;
  try {
    meta = await (await openSource(source)).metadata();
  } catch (err) {
    if (err instanceof SourceError) throw err;
    throw cannotRead(source, err);
  }
  if (meta.width === undefined || meta.height === undefined) {
    throw new SourceError(`Image has no dimensions: ${path.basename(source)}`, source);
  }
  return {
    pixelWidth: meta.width,
    pixelHeight: meta.height,
    orientation: meta.orientation,
  };
};

/**
 * Open an image rotated clockwise by `rotation` degrees.
 * An explicit angle bypasses sharp's own EXIF auto-orientation, so the
 * orientation tag only takes effect through the computed rotation.
 */
export async function openRotated(source: string, rotation: number): Promise<sharp.Sharp> {
  const image = await openSource(source);
  return rotation === 0 ? image : image.rotate(rotation);
}
