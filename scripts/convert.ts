#!/usr/bin/env node
/**
 * convert.ts — Lay out images onto PDF pages, or merge PDFs.
 *
 * Usage:
 *   npx tsx scripts/convert.ts <infile> <outfile> <conversion> [options]
 *   npx tsx scripts/convert.ts ./scans out.pdf images2pdf --streaming --progress --sort
 *   npx tsx scripts/convert.ts "a.pdf,b.pdf" merged.pdf pdfmerge
 *
 * Run with --help for the option list.
 *
 * Exit codes:
 *   0 — success
 *   2 — usage error, bad settings, missing input or conversion failure
 */
import { parseArgs, loadOverrides, USAGE } from "../src/cli/args.js";
import { convertImagesToPdf } from "../src/driver/convert-driver.js";
import { mergePdfs } from "../src/merge/pdf-merge.js";

async function main() {
  const args = process.argv.slice(2);
  if (args.length === 0) {
    console.error(USAGE);
    process.exit(2);
  }

  const parsed = parseArgs(args);
  if (parsed.help) {
    console.log(USAGE);
    return;
  }

  if (parsed.conversion === "pdfmerge") {
    const pages = await mergePdfs(parsed.infile, parsed.outfile);
    console.log(`Merged ${pages} pages -> ${parsed.outfile}`);
    return;
  }

  const overrides = loadOverrides(parsed.mappings, ({ line, reason }) => {
    console.error(`Warning: skipping mapping entry "${line}": ${reason}`);
  });

  const result = await convertImagesToPdf({
    input: parsed.infile,
    output: parsed.outfile,
    defaults: parsed.defaults,
    overrides,
    streaming: parsed.streaming,
    sort: parsed.sort,
    progress: parsed.progress,
  });
  console.log(`Wrote ${result.pages} pages -> ${result.output} (${result.mode})`);
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(2);
});
