import sharp from "sharp";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

export const RED = { r: 255, g: 0, b: 0 };
export const BLUE = { r: 0, g: 0, b: 255 };

export type Rgb = [number, number, number];

export function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

/** Solid-color PNG */
export async function writeSolidPng(
  file: string,
  width: number,
  height: number,
  color: { r: number; g: number; b: number } = RED
): Promise<string> {
  await sharp({ create: { width, height, channels: 3, background: color } })
    .png()
    .toFile(file);
  return file;
}

/** Image whose left half is red and right half blue, as PNG or JPEG */
export async function writeSplitImage(
  file: string,
  width: number,
  height: number,
  orientation?: number
): Promise<string> {
  const half = Math.floor(width / 2);
  const blue = await sharp({
    create: { width: width - half, height, channels: 3, background: BLUE },
  })
    .png()
    .toBuffer();
  const image = sharp({ create: { width, height, channels: 3, background: RED } }).composite([
    { input: blue, left: half, top: 0 },
  ]);
  if (file.endsWith(".png")) {
    await image.png().toFile(file);
  } else if (orientation === undefined) {
    await image.jpeg({ quality: 95 }).toFile(file);
  } else {
    await image.jpeg({ quality: 95 }).withMetadata({ orientation }).toFile(file);
  }
  return file;
}

/** Decode an encoded image and return a pixel reader */
export async function decodePixels(
  encoded: Buffer
): Promise<{ width: number; height: number; at(x: number, y: number): Rgb }> {
  const { data, info } = await sharp(encoded)
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });
  return {
    width: info.width,
    height: info.height,
    at(x, y) {
      const i = (y * info.width + x) * info.channels;
      return [data[i] ?? -1, data[i + 1] ?? -1, data[i + 2] ?? -1];
    },
  };
}

/** Classify a decoded pixel, tolerating JPEG noise */
export function colorName([r, g, b]: Rgb): "red" | "blue" | "white" | "other" {
  if (r > 200 && g < 60 && b < 60) return "red";
  if (r < 60 && g < 60 && b > 200) return "blue";
  if (r > 220 && g > 220 && b > 220) return "white";
  return "other";
}

/** 24-bit bottom-up BMP, left half red and right half blue */
export async function writeSplitBmp(file: string, width: number, height: number): Promise<string> {
  const rowSize = Math.ceil((width * 3) / 4) * 4;
  const pixelBytes = rowSize * height;
  const buf = Buffer.alloc(54 + pixelBytes);
  buf.write("BM", 0, "ascii");
  buf.writeUInt32LE(buf.length, 2);
  buf.writeUInt32LE(54, 10);
  buf.writeUInt32LE(40, 14);
  buf.writeInt32LE(width, 18);
  buf.writeInt32LE(height, 22);
  buf.writeUInt16LE(1, 26);
  buf.writeUInt16LE(24, 28);
  buf.writeUInt32LE(0, 30);
  buf.writeUInt32LE(pixelBytes, 34);
  buf.writeInt32LE(2835, 38);
  buf.writeInt32LE(2835, 42);

  const half = Math.floor(width / 2);
  for (let y = 0; y < height; y++) {
    const row = 54 + (height - 1 - y) * rowSize;
    for (let x = 0; x < width; x++) {
      const { r, g, b } = x < half ? RED : BLUE;
      buf[row + x * 3] = b;
      buf[row + x * 3 + 1] = g;
      buf[row + x * 3 + 2] = r;
    }
  }
  await fs.writeFile(file, buf);
  return file;
}
