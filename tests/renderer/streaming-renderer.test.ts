import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { PassThrough } from "node:stream";
import { buffer } from "node:stream/consumers";
import {
  PDFDict,
  PDFDocument,
  PDFName,
  PDFNumber,
  PDFRawStream,
  PDFStream,
  decodePDFRawStream,
} from "pdf-lib";
import { createStreamingRenderer } from "../../src/renderer/streaming-renderer.js";
import { computeLayout } from "../../src/layout/engine.js";
import { parseDefaults } from "../../src/schema/settings.js";
import { SourceError } from "../../src/errors.js";
import { makeTempDir, writeSplitBmp, writeSplitImage } from "../helpers/images.js";

type Matrix = [number, number, number, number, number, number];

/** `a` applied first, then `b` */
function concat(a: Matrix, b: Matrix): Matrix {
  return [
    a[0] * b[0] + a[1] * b[2],
    a[0] * b[1] + a[1] * b[3],
    a[2] * b[0] + a[3] * b[2],
    a[2] * b[1] + a[3] * b[3],
    a[4] * b[0] + a[5] * b[2] + b[4],
    a[4] * b[1] + a[5] * b[3] + b[5],
  ];
}

interface DrawnPage {
  /** Every `cm` operand list before the first image is painted */
  transforms: Matrix[];
  images: Array<{ width: number; height: number }>;
}

async function readDrawnPage(bytes: Buffer, index: number): Promise<DrawnPage> {
  const pdf = await PDFDocument.load(bytes);
  const page = pdf.getPage(index);
  const contents = page.node.Contents();
  if (!(contents instanceof PDFRawStream)) throw new Error("expected one content stream");
  const ops = Buffer.from(decodePDFRawStream(contents).decode()).toString("latin1");

  const paint = ops.search(/\/\S+ Do/);
  const transforms: Matrix[] = [];
  for (const m of ops.slice(0, paint).matchAll(/((?:-?[\d.]+\s+){6})cm/g)) {
    const [a = NaN, b = NaN, c = NaN, d = NaN, e = NaN, f = NaN] = (m[1] ?? "")
      .trim()
      .split(/\s+/)
      .map(Number);
    transforms.push([a, b, c, d, e, f]);
  }

  const xobjects = page.node.Resources()?.lookup(PDFName.of("XObject"), PDFDict);
  const images = (xobjects?.values() ?? []).map((ref) => {
    const stream = pdf.context.lookup(ref, PDFStream);
    return {
      width: stream.dict.lookup(PDFName.of("Width"), PDFNumber).asNumber(),
      height: stream.dict.lookup(PDFName.of("Height"), PDFNumber).asNumber(),
    };
  });
  return { transforms, images };
}

function expectMatrixCloseTo(actual: Matrix | undefined, expected: Matrix): void {
  expect(actual).toBeDefined();
  expected.forEach((v, i) => expect(actual?.[i]).toBeCloseTo(v, 4));
}

describe("createStreamingRenderer", () => {
  let dir: string;
  let source: string;
  let bitmap: string;

  beforeAll(async () => {
    dir = await makeTempDir("streaming");
    source = await writeSplitImage(path.join(dir, "split.png"), 200, 100);
    bitmap = await writeSplitBmp(path.join(dir, "split.bmp"), 200, 100);
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes one page per entry at the entry's page size", async () => {
    const intrinsics = { pixelWidth: 200, pixelHeight: 100 };
    const portrait = computeLayout("split.png", intrinsics, parseDefaults());
    const landscape = computeLayout(
      "split.png",
      intrinsics,
      parseDefaults({ autoOrient: true, pageSizeMm: { w: 148, h: 210 } })
    );

    const out = new PassThrough();
    const bytes = buffer(out);
    const renderer = createStreamingRenderer(out);
    expect(renderer.mode).toBe("streaming");
    await renderer.addPage({ source, entry: portrait });
    await renderer.addPage({ source, entry: landscape });
    expect(await renderer.finish()).toEqual({ mode: "streaming", pages: 2 });

    const pdf = await PDFDocument.load(await bytes);
    expect(pdf.getPageCount()).toBe(2);
    const first = pdf.getPage(0).getSize();
    expect(first.width).toBeCloseTo(portrait.page.w, 3);
    expect(first.height).toBeCloseTo(portrait.page.h, 3);
    const second = pdf.getPage(1).getSize();
    expect(second.width).toBeCloseTo(landscape.page.w, 3);
    expect(second.height).toBeCloseTo(landscape.page.h, 3);
    expect(second.width).toBeGreaterThan(second.height);
  });

  it("draws the image at the placed rect, measured from the top-left corner", async () => {
    const entry = computeLayout(
      "split.png",
      { pixelWidth: 200, pixelHeight: 100 },
      parseDefaults({ scaling: "original", alignH: "left", alignV: "top" })
    );
    const { x, y, w, h } = entry.placed;
    expect([w, h]).toEqual([48, 24]);

    const out = new PassThrough();
    const bytes = buffer(out);
    const renderer = createStreamingRenderer(out);
    await renderer.addPage({ source, entry });
    await renderer.finish();

    const drawn = await readDrawnPage(await bytes, 0);
    expect(drawn.images).toEqual([{ width: 200, height: 100 }]);
    expect(drawn.transforms).toHaveLength(2);
    const [flip, placement] = drawn.transforms;
    expectMatrixCloseTo(flip, [1, 0, 0, -1, 0, entry.page.h]);
    expectMatrixCloseTo(placement, [w, 0, 0, -h, x, y + h]);

    // unit image square in PDF space: bottom-left origin, y up
    const onPage = placement && flip ? concat(placement, flip) : undefined;
    expectMatrixCloseTo(onPage, [w, 0, 0, h, x, entry.page.h - y - h]);
  });

  it("embeds the rotated pixels for a quarter-turn entry", async () => {
    const entry = computeLayout(
      "split.bmp",
      { pixelWidth: 200, pixelHeight: 100 },
      parseDefaults({ scaling: "original", alignH: "left", alignV: "top", rotationOverride: 90 })
    );
    expect(entry.rotation).toBe(90);
    expect([entry.pixelWidth, entry.pixelHeight]).toEqual([100, 200]);

    const out = new PassThrough();
    const bytes = buffer(out);
    const renderer = createStreamingRenderer(out);
    await renderer.addPage({ source: bitmap, entry });
    await renderer.finish();

    const drawn = await readDrawnPage(await bytes, 0);
    expect(drawn.images).toEqual([{ width: 100, height: 200 }]);
    const { x, y, w, h } = entry.placed;
    expectMatrixCloseTo(drawn.transforms[1], [w, 0, 0, -h, x, y + h]);
  });

  it("refuses to finish without pages", async () => {
    const renderer = createStreamingRenderer(new PassThrough());
    await expect(renderer.finish()).rejects.toBeInstanceOf(SourceError);
  });

  it("refuses pages after finishing", async () => {
    const out = new PassThrough();
    const bytes = buffer(out);
    const renderer = createStreamingRenderer(out);
    const entry = computeLayout("split.png", { pixelWidth: 200, pixelHeight: 100 }, parseDefaults());
    await renderer.addPage({ source, entry });
    await renderer.finish();
    await bytes;
    await expect(renderer.addPage({ source, entry })).rejects.toThrow(
      "Renderer already finished; cannot add pages"
    );
  });
});
