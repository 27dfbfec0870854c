import { z } from "zod";
import {
  DEFAULT_DPI,
  DEFAULT_MARGIN_MM,
  DEFAULT_PAGE_SIZE,
  PAGE_SIZES_MM,
} from "../constants.js";
import { ConfigError } from "../errors.js";

export const ScalingMode = z.enum(["fit", "fill", "stretch", "original"]);
export type ScalingMode = z.infer<typeof ScalingMode>;

export const AlignH = z.enum(["left", "center", "right"]);
export type AlignH = z.infer<typeof AlignH>;

export const AlignV = z.enum(["top", "center", "bottom"]);
export type AlignV = z.infer<typeof AlignV>;

export const Rotation = z.union([
  z.literal(0),
  z.literal(90),
  z.literal(180),
  z.literal(270),
]);
export type Rotation = z.infer<typeof Rotation>;

export const PageSizeSchema = z.object({
  w: z.number().finite().positive(),
  h: z.number().finite().positive(),
});
export type PageSize = z.infer<typeof PageSizeSchema>;

const marginSide = z.number().finite().nonnegative();

export const MarginsSchema = z.object({
  top: marginSide,
  right: marginSide,
  bottom: marginSide,
  left: marginSide,
});
export type Margins = z.infer<typeof MarginsSchema>;

const defaultPage = PAGE_SIZES_MM.get(DEFAULT_PAGE_SIZE) ?? { w: 210, h: 297 };

/** Run-wide settings, before per-image overrides */
export const ConversionDefaultsSchema = z.object({
  pageSizeMm: PageSizeSchema.default(defaultPage),
  marginsMm: MarginsSchema.default({
    top: DEFAULT_MARGIN_MM,
    right: DEFAULT_MARGIN_MM,
    bottom: DEFAULT_MARGIN_MM,
    left: DEFAULT_MARGIN_MM,
  }),
  scaling: ScalingMode.default("fit"),
  alignH: AlignH.default("center"),
  alignV: AlignV.default("center"),
  dpi: z.number().finite().positive().default(DEFAULT_DPI),
  autorotate: z.boolean().default(false),
  autoOrient: z.boolean().default(false),
});
export type ConversionDefaults = z.infer<typeof ConversionDefaultsSchema>;
export type ConversionDefaultsInput = z.input<typeof ConversionDefaultsSchema>;

/** Fully resolved settings for one image */
export const EffectiveSettingsSchema = z.object({
  pageSizeMm: PageSizeSchema,
  marginsMm: MarginsSchema,
  rotationOverride: Rotation.optional(),
  scaling: ScalingMode,
  alignH: AlignH,
  alignV: AlignV,
  dpi: z.number().finite().positive(),
  autorotate: z.boolean(),
  autoOrient: z.boolean(),
});
export type EffectiveSettings = z.infer<typeof EffectiveSettingsSchema>;

/** Per-image overrides keyed by file basename */
export interface SettingsOverrides {
  pageSizes?: ReadonlyMap<string, PageSize>;
  margins?: ReadonlyMap<string, Margins>;
  rotations?: ReadonlyMap<string, Rotation>;
}

/** Parse and validate run-wide defaults. Throws ConfigError on invalid input. */
export function parseDefaults(data: unknown = {}): ConversionDefaults {
  const result = ConversionDefaultsSchema.safeParse(data);
  if (!result.success) {
    throw ConfigError.fromZod(result.error, "defaults");
  }
  return result.data;
}

/** Reduce a multiple of 90 into [0, 360). Returns undefined for any other angle. */
export function normalizeRotation(deg: number): Rotation | undefined {
  switch (((deg % 360) + 360) % 360) {
    case 0:
      return 0;
    case 90:
      return 90;
    case 180:
      return 180;
    case 270:
      return 270;
    default:
      return undefined;
  }
}
