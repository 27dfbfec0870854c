/** Named page sizes, portrait, in millimetres */
export const PAGE_SIZES_MM: ReadonlyMap<string, { w: number; h: number }> = new Map([
  ["A3", { w: 297, h: 420 }],
  ["A4", { w: 210, h: 297 }],
  ["A5", { w: 148, h: 210 }],
  ["LETTER", { w: 216, h: 279 }],
]);

/** Default page size name */
export const DEFAULT_PAGE_SIZE = "A4";

/** Default resolution for mm ↔ pixel conversions */
export const DEFAULT_DPI = 300;

/** Default uniform margin (mm) */
export const DEFAULT_MARGIN_MM = 10;

export const MM_PER_INCH = 25.4;

/** Layout unit: PostScript points per inch */
export const POINTS_PER_INCH = 72;

/** File extensions picked up when the input is a directory (lowercase, no dot) */
export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  "jpg",
  "jpeg",
  "png",
  "tiff",
  "bmp",
  "webp",
]);

/**
 * Clockwise correction (degrees) for EXIF orientation tags.
 * Mirrored variants (2, 4, 5, 7) are treated as identity.
 */
export const ORIENTATION_CORRECTION_DEG: ReadonlyMap<number, number> = new Map([
  [3, 180],
  [6, 90],
  [8, 270],
]);

/** JPEG quality for page images handed to the PDF writers */
export const JPEG_QUALITY = 92;

/** Canvas background for raster pages and flattened transparency */
export const PAGE_BACKGROUND = "#ffffff";
