import * as fs from "node:fs/promises";
import * as path from "node:path";
import { PDFDocument } from "pdf-lib";
import { SourceError } from "../errors.js";

/**
 * Concatenate PDF files in the given order into `output`.
 * `inputs` is a list of paths or a comma-separated string of them.
 * Returns the number of pages written.
 */
export async function mergePdfs(
  inputs: string | readonly string[],
  output: string
): Promise<number> {
  const files = (typeof inputs === "string" ? inputs.split(",") : [...inputs])
    .map((p) => p.trim())
    .filter((p) => p !== "");
  if (files.length === 0) {
    throw new SourceError("No PDF files provided to merge.");
  }

  const sources: Uint8Array[] = [];
  for (const file of files) {
    const bytes = await fs.readFile(file).catch(() => null);
    if (!bytes) throw new SourceError(`Input not found: ${file}`, file);
    sources.push(bytes);
  }

  const merged = await PDFDocument.create();
  for (const [i, bytes] of sources.entries()) {
    let src: PDFDocument;
    try {
      src = await PDFDocument.load(bytes);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new SourceError(`Cannot read PDF ${files[i] ?? ""}: ${detail}`, files[i]);
    }
    const pages = await merged.copyPages(src, src.getPageIndices());
    for (const page of pages) merged.addPage(page);
  }

  await fs.mkdir(path.dirname(path.resolve(output)), { recursive: true });
  await fs.writeFile(output, await merged.save());
  return merged.getPageCount();
}
