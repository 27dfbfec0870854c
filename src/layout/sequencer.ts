import * as fs from "node:fs/promises";
import * as path from "node:path";
import { IMAGE_EXTENSIONS } from "../constants.js";
import { SourceError } from "../errors.js";
import { readIntrinsics as readWithSharp, type IntrinsicsReader } from "../image/source.js";
import type { PlannedPage } from "../schema/plan.js";
import type { ConversionDefaults, SettingsOverrides } from "../schema/settings.js";
import { resolveSettings } from "../settings/resolver.js";
import { computeLayout } from "./engine.js";

export interface CollectOptions {
  /** Sort a directory listing by name (explicit lists keep their order) */
  sort?: boolean;
}

function hasImageExtension(name: string): boolean {
  const ext = name.toLowerCase().split(".").pop() ?? "";
  return IMAGE_EXTENSIONS.has(ext);
}

async function isDirectory(p: string): Promise<boolean> {
  const stat = await fs.stat(p).catch(() => null);
  return stat?.isDirectory() ?? false;
}

/** Regular file, following symlinks; false for dangling links */
async function isFile(p: string): Promise<boolean> {
  const stat = await fs.stat(p).catch(() => null);
  return stat?.isFile() ?? false;
}

/**
 * Turn the input argument into an ordered list of image paths: either a
 * directory's image files, or a comma-separated list of paths that must
 * all exist. Throws SourceError for a missing file or an empty result.
 */
export async function collectSources(
  input: string,
  options: CollectOptions = {}
): Promise<string[]> {
  const files: string[] = [];

  if (await isDirectory(input)) {
    const entries = await fs.readdir(input, { withFileTypes: true });
    const names: string[] = [];
    for (const e of entries) {
      if (e.isFile() || (e.isSymbolicLink() && (await isFile(path.join(input, e.name))))) {
        names.push(e.name);
      }
    }
    if (options.sort) names.sort();
    for (const name of names) {
      if (hasImageExtension(name)) files.push(path.join(input, name));
    }
  } else {
    const parts = input
      .split(",")
      .map((p) => p.trim())
      .filter((p) => p !== "");
    for (const p of parts) {
      const stat = await fs.stat(p).catch(() => null);
      if (!stat) throw new SourceError(`Input not found: ${p}`, p);
      files.push(p);
    }
  }

  if (files.length === 0) {
    throw new SourceError("No images found to convert/merge.");
  }
  return files;
}

export interface PlanOptions {
  defaults: ConversionDefaults;
  overrides?: SettingsOverrides;
  /** Defaults to reading metadata with sharp */
  readIntrinsics?: IntrinsicsReader;
}

/**
 * Lay out `sources` in order, one entry per image. Lazy and forward-only:
 * each image is read only when its entry is requested, and the first
 * failure ends the sequence.
 */
export async function* planLayout(
  sources: readonly string[],
  options: PlanOptions
): AsyncGenerator<PlannedPage, void, undefined> {
  if (sources.length === 0) {
    throw new SourceError("No images found to convert/merge.");
  }
  const read = options.readIntrinsics ?? readWithSharp;

  for (const source of sources) {
    const sourceId = path.basename(source);
    const intrinsics = await read(source);
    const settings = resolveSettings(sourceId, options.defaults, options.overrides);
    yield { source, entry: computeLayout(sourceId, intrinsics, settings) };
  }
}
