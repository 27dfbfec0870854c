/**
 * Length in layout units (PostScript points). Only utils/units.ts knows how
 * this relates to millimetres and device pixels.
 */
export type LayoutLength = number;

/** A rectangle in page-local coordinates: origin top-left, y grows downward */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/** Pixel size and capture orientation of a source image */
export interface ImageIntrinsics {
  pixelWidth: number;
  pixelHeight: number;
  /** EXIF orientation tag (1-8), absent when the image carries none */
  orientation?: number;
}

/** Page box in layout units, after any auto-orient swap */
export interface PageGeometry {
  w: LayoutLength;
  h: LayoutLength;
}

/** Page box minus margins */
export interface ContentBox {
  x0: LayoutLength;
  y0: LayoutLength;
  x1: LayoutLength;
  y1: LayoutLength;
}

/** One output page: where a single image goes */
export interface LayoutPlanEntry {
  sourceId: string;
  page: PageGeometry;
  contentBox: ContentBox;
  placed: Rect;
  /** Net clockwise rotation applied to the source pixels (degrees) */
  rotation: 0 | 90 | 180 | 270;
  /** Pixel size after rotation */
  pixelWidth: number;
  pixelHeight: number;
  dpi: number;
}

/** A plan entry paired with the file it was computed from */
export interface PlannedPage {
  source: string;
  entry: LayoutPlanEntry;
}
