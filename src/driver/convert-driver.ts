import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { IntrinsicsReader } from "../image/source.js";
import { collectSources, planLayout } from "../layout/sequencer.js";
import { createBatchRenderer } from "../renderer/batch-renderer.js";
import { createStreamingRenderer } from "../renderer/streaming-renderer.js";
import type { PageRenderer, RenderMode } from "../renderer/types.js";
import type { ConversionDefaults, SettingsOverrides } from "../schema/settings.js";
import { createProgress } from "../utils/progress.js";

export interface ConvertOptions {
  /** Directory of images, or a comma-separated list of image paths */
  input: string;
  output: string;
  defaults: ConversionDefaults;
  overrides?: SettingsOverrides;
  /** Write pages as they are laid out (pdfkit) instead of encoding them all at the end */
  streaming?: boolean;
  /** Sort a directory listing by file name */
  sort?: boolean;
  progress?: boolean;
  readIntrinsics?: IntrinsicsReader;
}

export interface ConvertResult {
  output: string;
  pages: number;
  mode: RenderMode;
}

/**
 * Convert a set of images into one PDF, one image per page, in input order.
 * Any failure aborts the run: the partly written output file is removed
 * and the error is rethrown.
 */
export async function convertImagesToPdf(options: ConvertOptions): Promise<ConvertResult> {
  const sources = await collectSources(options.input, { sort: options.sort });

  await fs.mkdir(path.dirname(path.resolve(options.output)), { recursive: true });
  const handle = await fs.open(options.output, "w");
  const out = handle.createWriteStream();
  const failure: { error?: Error } = {};
  out.on("error", (err) => {
    failure.error = err;
  });
  const renderer: PageRenderer = options.streaming
    ? createStreamingRenderer(out)
    : createBatchRenderer(out);
  const progress = createProgress(sources.length, "Images", options.progress ?? false);

  try {
    const plan = planLayout(sources, {
      defaults: options.defaults,
      overrides: options.overrides,
      readIntrinsics: options.readIntrinsics,
    });
    for await (const page of plan) {
      await renderer.addPage(page);
      if (failure.error) throw failure.error;
      progress.tick();
    }
    const summary = await renderer.finish();
    return { output: options.output, pages: summary.pages, mode: summary.mode };
  } catch (err) {
    out.destroy();
    await fs.rm(options.output, { force: true });
    throw err;
  }
}
