import PDFDocument from "pdfkit";
import type { Writable } from "node:stream";
import { finished } from "node:stream/promises";
import { JPEG_QUALITY, PAGE_BACKGROUND } from "../constants.js";
import { SourceError } from "../errors.js";
import { openRotated } from "../image/source.js";
import type { PlannedPage } from "../schema/plan.js";
import type { PageRenderer, RenderSummary } from "./types.js";

/**
 * Constant-memory renderer: every page is drawn and handed to the PDF
 * stream as soon as it is added, and its pixel data is not kept.
 * pdfkit shares the layout's top-left origin and point unit, so plan
 * coordinates are used as they are.
 */
export function createStreamingRenderer(output: Writable): PageRenderer {
  const doc = new PDFDocument({ autoFirstPage: false, margin: 0 });
  doc.pipe(output);
  let pageCount = 0;
  let closed = false;

  return {
    mode: "streaming",

    async addPage({ source, entry }: PlannedPage): Promise<void> {
      if (closed) {
        throw new Error("Renderer already finished; cannot add pages");
      }
      const image = await (await openRotated(source, entry.rotation))
        .flatten({ background: PAGE_BACKGROUND })
        .jpeg({ quality: JPEG_QUALITY })
        .toBuffer();

      doc.addPage({ size: [entry.page.w, entry.page.h], margin: 0 });
      const { x, y, w, h } = entry.placed;
      doc.image(image, x, y, { width: w, height: h });
      pageCount++;
    },

    async finish(): Promise<RenderSummary> {
      if (closed) {
        throw new Error("Renderer already finished");
      }
      closed = true;
      if (pageCount === 0) {
        throw new SourceError("No pages to write");
      }
      const written = finished(output, { readable: false });
      doc.end();
      await written;
      return { mode: "streaming", pages: pageCount };
    },
  };
}
