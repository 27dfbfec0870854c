import sharp from "sharp";
import { PDFDocument } from "pdf-lib";
import type { Writable } from "node:stream";
import { finished } from "node:stream/promises";
import { JPEG_QUALITY, PAGE_BACKGROUND } from "../constants.js";
import { SourceError } from "../errors.js";
import { openRotated } from "../image/source.js";
import type { LayoutPlanEntry, PageGeometry, PlannedPage, Rect } from "../schema/plan.js";
import { intersectRects } from "../utils/geometry.js";
import { layoutUnitsToDevicePixels } from "../utils/units.js";
import type { PageRenderer, RenderSummary } from "./types.js";

/** A finished page canvas, JPEG-encoded */
interface RasterPage {
  jpeg: Buffer;
  page: PageGeometry;
}

/** Layout rect → whole device pixels; width and height are at least 1 */
function toDeviceRect(r: Rect, dpi: number): Rect {
  return {
    x: layoutUnitsToDevicePixels(r.x, dpi),
    y: layoutUnitsToDevicePixels(r.y, dpi),
    w: Math.max(1, layoutUnitsToDevicePixels(r.w, dpi)),
    h: Math.max(1, layoutUnitsToDevicePixels(r.h, dpi)),
  };
}

/**
 * Paint one plan entry onto a white canvas at the entry's DPI.
 * The image is clipped to the page, since fill and original modes may
 * place it partly outside.
 */
export async function rasterizePage(source: string, entry: LayoutPlanEntry): Promise<Buffer> {
  const pagePx = toDeviceRect({ x: 0, y: 0, w: entry.page.w, h: entry.page.h }, entry.dpi);
  const target = toDeviceRect(entry.placed, entry.dpi);
  const canvas = sharp({
    create: {
      width: pagePx.w,
      height: pagePx.h,
      channels: 3,
      background: PAGE_BACKGROUND,
    },
  });

  const visible = intersectRects(target, pagePx);
  if (!visible) {
    return canvas.jpeg({ quality: JPEG_QUALITY }).toBuffer();
  }

  const resized = await (await openRotated(source, entry.rotation))
    .flatten({ background: PAGE_BACKGROUND })
    .resize(target.w, target.h, { fit: "fill" })
    .toBuffer();
  const clipped = await sharp(resized)
    .extract({
      left: visible.x - target.x,
      top: visible.y - target.y,
      width: visible.w,
      height: visible.h,
    })
    .toBuffer();

  return canvas
    .composite([{ input: clipped, left: visible.x, top: visible.y }])
    .jpeg({ quality: JPEG_QUALITY })
    .toBuffer();
}

/**
 * Whole-document renderer: pages are rasterized as they arrive and kept in
 * memory until `finish`, which encodes them into one PDF in a single save.
 */
export function createBatchRenderer(output: Writable): PageRenderer {
  const pages: RasterPage[] = [];
  let closed = false;

  return {
    mode: "batch",

    async addPage({ source, entry }: PlannedPage): Promise<void> {
      if (closed) {
        throw new Error("Renderer already finished; cannot add pages");
      }
      const jpeg = await rasterizePage(source, entry);
      pages.push({ jpeg, page: entry.page });
    },

    async finish(): Promise<RenderSummary> {
      if (closed) {
        throw new Error("Renderer already finished");
      }
      closed = true;
      if (pages.length === 0) {
        throw new SourceError("No pages to write");
      }

      const pdf = await PDFDocument.create();
      for (const { jpeg, page } of pages) {
        const image = await pdf.embedJpg(jpeg);
        const pdfPage = pdf.addPage([page.w, page.h]);
        pdfPage.drawImage(image, { x: 0, y: 0, width: page.w, height: page.h });
      }
      const bytes = await pdf.save();
      const pageCount = pages.length;
      pages.length = 0;

      const written = finished(output, { readable: false });
      output.end(bytes);
      await written;
      return { mode: "batch", pages: pageCount };
    },
  };
}
