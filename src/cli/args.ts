import { DEFAULT_DPI, DEFAULT_MARGIN_MM, DEFAULT_PAGE_SIZE } from "../constants.js";
import { ConfigError } from "../errors.js";
import {
  parseDefaults,
  type ConversionDefaults,
  type SettingsOverrides,
} from "../schema/settings.js";
import {
  loadMapping,
  parseMarginValue,
  parsePageSize,
  parseRotationValue,
  type SkippedEntry,
} from "../settings/mapping.js";

export type Conversion = "images2pdf" | "pdfmerge";

const CONVERSIONS: ReadonlyMap<string, Conversion> = new Map([
  ["image2pdf", "images2pdf"],
  ["image_to_pdf", "images2pdf"],
  ["img2pdf", "images2pdf"],
  ["images2pdf", "images2pdf"],
  ["images_to_pdf", "images2pdf"],
  ["imgmergepdf", "images2pdf"],
  ["image_merge_pdf", "images2pdf"],
  ["pdfmerge", "pdfmerge"],
  ["mergepdf", "pdfmerge"],
  ["pdf_merge", "pdfmerge"],
]);

/** Conversions accepted on the command line but not provided by this tool */
const UNSUPPORTED = new Set([
  "pdf2doc",
  "doc2pdf",
  "remove_pdf_password",
  "remove_office_password",
]);

export const USAGE = `Usage: pagewright <infile> <outfile> <conversion> [options]

Conversions:
  image2pdf | images2pdf   images (directory or comma-separated list) -> one PDF
  pdfmerge                 comma-separated PDFs -> one PDF

Options:
  -P, --page-size <size>        A3 | A4 | A5 | LETTER | WIDTHxHEIGHT in mm (default ${DEFAULT_PAGE_SIZE})
  -d, --dpi <n>                 resolution for mm/pixel conversion (default ${DEFAULT_DPI})
  -m, --margin-mm <mm>          uniform margin (default ${DEFAULT_MARGIN_MM})
  -s, --scaling <mode>          fit | fill | stretch | original (default fit)
      --align-h <a>             left | center | right (default center)
      --align-v <a>             top | center | bottom (default center)
      --per-page-sizes <map>    CSV file or "a.jpg:210x297,b.jpg:A5"
      --per-image-margins <map> CSV file or "a.jpg:10,b.jpg:8x12x8x12"
      --per-image-rotation <map> CSV file or "a.jpg:90"
      --autorotate              apply EXIF orientation before placing
      --auto-orient             match page orientation to each image
      --streaming               write pages as they are laid out (constant memory)
      --progress                print progress to stderr
      --sort                    sort a directory listing by name
  -h, --help                    show this help`;

type ValueOption =
  | "pageSize"
  | "dpi"
  | "marginMm"
  | "scaling"
  | "alignH"
  | "alignV"
  | "perPageSizes"
  | "perImageMargins"
  | "perImageRotation";

type FlagOption = "autorotate" | "autoOrient" | "streaming" | "progress" | "sort" | "help";

const VALUE_OPTIONS: ReadonlyMap<string, ValueOption> = new Map([
  ["--page-size", "pageSize"],
  ["-P", "pageSize"],
  ["--dpi", "dpi"],
  ["-d", "dpi"],
  ["--margin-mm", "marginMm"],
  ["-m", "marginMm"],
  ["--scaling", "scaling"],
  ["-s", "scaling"],
  ["--align-h", "alignH"],
  ["--align-v", "alignV"],
  ["--per-page-sizes", "perPageSizes"],
  ["--per-image-margins", "perImageMargins"],
  ["--per-image-rotation", "perImageRotation"],
]);

const FLAG_OPTIONS: ReadonlyMap<string, FlagOption> = new Map([
  ["--autorotate", "autorotate"],
  ["--auto-orient", "autoOrient"],
  ["--streaming", "streaming"],
  ["--progress", "progress"],
  ["--sort", "sort"],
  ["--help", "help"],
  ["-h", "help"],
]);

/** Parsed command line */
export interface CliArgs {
  infile: string;
  outfile: string;
  conversion: Conversion;
  defaults: ConversionDefaults;
  /** Raw mapping arguments: a CSV path or inline mapping each */
  mappings: {
    pageSizes?: string;
    margins?: string;
    rotations?: string;
  };
  streaming: boolean;
  progress: boolean;
  sort: boolean;
}

export type ParseResult = { help: true } | ({ help: false } & CliArgs);

function parseCliNumber(raw: string, flag: string): number {
  const v = raw.trim() === "" ? NaN : Number(raw);
  if (!Number.isFinite(v)) {
    throw new ConfigError(`${flag} expects a number, got "${raw}"`);
  }
  return v;
}

/**
 * Parse command-line arguments (without the node/script prefix).
 * Throws ConfigError for unknown options, missing values, bad values and
 * unknown or unsupported conversions.
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  const positional: string[] = [];
  const values = new Map<ValueOption, string>();
  const flags = new Set<FlagOption>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const name = eq >= 0 ? arg.slice(0, eq) : arg;

    const valueOpt = VALUE_OPTIONS.get(name);
    if (valueOpt) {
      const value = eq >= 0 ? arg.slice(eq + 1) : argv[++i];
      if (value === undefined) {
        throw new ConfigError(`Missing value for ${name}`);
      }
      values.set(valueOpt, value);
      continue;
    }
    const flag = FLAG_OPTIONS.get(name);
    if (flag) {
      flags.add(flag);
      continue;
    }
    if (arg.startsWith("-") && arg.length > 1) {
      throw new ConfigError(`Unknown option: ${arg}`);
    }
    positional.push(arg);
  }

  if (flags.has("help")) return { help: true };

  const [infile, outfile, conversionName, ...extra] = positional;
  if (infile === undefined || outfile === undefined || conversionName === undefined) {
    throw new ConfigError("Expected <infile> <outfile> <conversion>");
  }
  if (extra.length > 0) {
    throw new ConfigError(`Unexpected argument: ${extra[0] ?? ""}`);
  }

  const key = conversionName.toLowerCase();
  const conversion = CONVERSIONS.get(key);
  if (!conversion) {
    if (UNSUPPORTED.has(key)) {
      throw new ConfigError(`Conversion "${conversionName}" is not supported by this tool`);
    }
    throw new ConfigError(
      `Unknown conversion type: ${conversionName}. Use one of: image2pdf | images2pdf | pdfmerge`
    );
  }

  const dpiRaw = values.get("dpi");
  const marginRaw = values.get("marginMm");
  const margin =
    marginRaw === undefined ? DEFAULT_MARGIN_MM : parseCliNumber(marginRaw, "--margin-mm");

  const defaults = parseDefaults({
    pageSizeMm: parsePageSize(values.get("pageSize") ?? DEFAULT_PAGE_SIZE),
    marginsMm: { top: margin, right: margin, bottom: margin, left: margin },
    scaling: values.get("scaling"),
    alignH: values.get("alignH"),
    alignV: values.get("alignV"),
    dpi: dpiRaw === undefined ? undefined : parseCliNumber(dpiRaw, "--dpi"),
    autorotate: flags.has("autorotate"),
    autoOrient: flags.has("autoOrient"),
  });

  return {
    help: false,
    infile,
    outfile,
    conversion,
    defaults,
    mappings: {
      pageSizes: values.get("perPageSizes"),
      margins: values.get("perImageMargins"),
      rotations: values.get("perImageRotation"),
    },
    streaming: flags.has("streaming"),
    progress: flags.has("progress"),
    sort: flags.has("sort"),
  };
}

/** Load the per-image mapping arguments into settings overrides */
export function loadOverrides(
  mappings: CliArgs["mappings"],
  onSkip?: (entry: SkippedEntry) => void
): SettingsOverrides {
  return {
    pageSizes:
      mappings.pageSizes === undefined
        ? undefined
        : loadMapping(mappings.pageSizes, parsePageSize, onSkip),
    margins:
      mappings.margins === undefined
        ? undefined
        : loadMapping(mappings.margins, parseMarginValue, onSkip),
    rotations:
      mappings.rotations === undefined
        ? undefined
        : loadMapping(mappings.rotations, parseRotationValue, onSkip),
  };
}
