import { MM_PER_INCH, POINTS_PER_INCH } from "../constants.js";
import type { LayoutLength } from "../schema/plan.js";

/** Millimetres → whole device pixels at `dpi` */
export function mmToDeviceUnits(mm: number, dpi: number): number {
  return Math.round((mm / MM_PER_INCH) * dpi);
}

/** Millimetres → layout units */
export function mmToLayoutUnits(mm: number): LayoutLength {
  return (mm / MM_PER_INCH) * POINTS_PER_INCH;
}

/** Device pixels at `dpi` → layout units */
export function devicePixelsToLayoutUnits(pixels: number, dpi: number): LayoutLength {
  return (pixels / dpi) * POINTS_PER_INCH;
}

/** Layout units → whole device pixels at `dpi` */
export function layoutUnitsToDevicePixels(length: LayoutLength, dpi: number): number {
  return Math.round((length / POINTS_PER_INCH) * dpi);
}

/** Layout units → millimetres */
export function layoutUnitsToMm(length: LayoutLength): number {
  return (length / POINTS_PER_INCH) * MM_PER_INCH;
}
