import * as fs from "node:fs";
import * as path from "node:path";
import { PAGE_SIZES_MM } from "../constants.js";
import { ConfigError } from "../errors.js";
import {
  MarginsSchema,
  PageSizeSchema,
  normalizeRotation,
  type Margins,
  type PageSize,
  type Rotation,
} from "../schema/settings.js";

/** Parses one mapping value; throws ConfigError when the value is malformed */
export type ValueParser<T> = (value: string) => T;

/** A mapping entry dropped during parsing */
export interface SkippedEntry {
  line: string;
  reason: string;
}

export interface MappingOptions {
  /** "csv": one entry per line with # comments. "inline": comma-separated pairs. */
  format: "csv" | "inline";
  onSkip?: (entry: SkippedEntry) => void;
}

function parseNumber(raw: string, what: string): number {
  const s = raw.trim();
  const v = s === "" ? NaN : Number(s);
  if (!Number.isFinite(v)) {
    throw new ConfigError(`Invalid ${what} number: ${raw}`);
  }
  return v;
}

/** Named page size (A3, A4, A5, LETTER) or WIDTHxHEIGHT in mm */
export function parsePageSize(value: string): PageSize {
  const v = value.trim().toUpperCase();
  const named = PAGE_SIZES_MM.get(v);
  if (named) return { ...named };

  const parts = v.split("X");
  if (parts.length !== 2) {
    throw new ConfigError(`Unknown page size: ${value}`);
  }
  const size = {
    w: parseNumber(parts[0] ?? "", "page size"),
    h: parseNumber(parts[1] ?? "", "page size"),
  };
  if (!PageSizeSchema.safeParse(size).success) {
    throw new ConfigError(`Page size must be positive: ${value}`);
  }
  return size;
}

/**
 * Margins in mm: 1, 2 or 4 numbers separated by "x" or ",".
 * 1 → all sides; 2 → top/bottom then right/left; 4 → top,right,bottom,left.
 */
export function parseMarginValue(value: string): Margins {
  const s = value.trim();
  let parts: string[];
  if (/x/i.test(s)) {
    parts = s.split(/x/i);
  } else if (s.includes(",")) {
    parts = s.split(",");
  } else {
    parts = [s];
  }
  const vals = parts.map((p) => parseNumber(p, "margin"));

  let margins: Margins;
  const [a = 0, b = 0, c = 0, d = 0] = vals;
  switch (vals.length) {
    case 1:
      margins = { top: a, right: a, bottom: a, left: a };
      break;
    case 2:
      margins = { top: a, right: b, bottom: a, left: b };
      break;
    case 4:
      margins = { top: a, right: b, bottom: c, left: d };
      break;
    default:
      throw new ConfigError("Margins must be 1, 2 or 4 numbers (mm)");
  }
  if (!MarginsSchema.safeParse(margins).success) {
    throw new ConfigError(`Margins must be non-negative: ${value}`);
  }
  return margins;
}

/** Integer degrees, multiple of 90, normalized into 0|90|180|270 */
export function parseRotationValue(value: string): Rotation {
  const s = value.trim();
  if (!/^[+-]?\d+$/.test(s)) {
    throw new ConfigError(
      `Invalid rotation value: ${value}; must be integer degrees (0|90|180|270)`
    );
  }
  const rotation = normalizeRotation(parseInt(s, 10));
  if (rotation === undefined) {
    throw new ConfigError(`Rotation must be a multiple of 90: ${value}`);
  }
  return rotation;
}

/** Split "name:value" (or "name,value") at the first separator */
function splitEntry(entry: string): [string, string] | null {
  const colon = entry.indexOf(":");
  if (colon >= 0) return [entry.slice(0, colon), entry.slice(colon + 1)];
  const comma = entry.indexOf(",");
  if (comma >= 0) return [entry.slice(0, comma), entry.slice(comma + 1)];
  return null;
}

/**
 * Parse a per-image mapping keyed by file basename.
 * Entries that cannot be split or whose value fails to parse are skipped
 * (reported through `onSkip`); the default stays in effect for that key.
 */
export function parseMapping<T>(
  text: string,
  parseValue: ValueParser<T>,
  options: MappingOptions
): Map<string, T> {
  const mapping = new Map<string, T>();
  const skip = (line: string, reason: string) => options.onSkip?.({ line, reason });

  const entries =
    options.format === "csv"
      ? text
          .split(/\r?\n/)
          .map((ln) => ln.trim())
          .filter((ln) => ln !== "" && !ln.startsWith("#"))
      : text
          .split(",")
          .map((p) => p.trim())
          .filter((p) => p !== "");

  for (const entry of entries) {
    const split = splitEntry(entry);
    if (!split) {
      skip(entry, "missing ':' or ',' separator");
      continue;
    }
    const name = path.basename(split[0].trim());
    try {
      mapping.set(name, parseValue(split[1].trim()));
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      skip(entry, err.message);
    }
  }

  return mapping;
}

/**
 * Load a mapping from a CSV file when `value` names one, otherwise parse
 * `value` itself as an inline mapping.
 */
export function loadMapping<T>(
  value: string,
  parseValue: ValueParser<T>,
  onSkip?: (entry: SkippedEntry) => void
): Map<string, T> {
  const trimmed = value.trim();
  if (trimmed === "") return new Map();
  if (fs.existsSync(trimmed) && fs.statSync(trimmed).isFile()) {
    const text = fs.readFileSync(trimmed, "utf-8");
    return parseMapping(text, parseValue, { format: "csv", onSkip });
  }
  return parseMapping(trimmed, parseValue, { format: "inline", onSkip });
}
