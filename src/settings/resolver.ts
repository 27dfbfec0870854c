import { ConfigError } from "../errors.js";
import {
  EffectiveSettingsSchema,
  type ConversionDefaults,
  type EffectiveSettings,
  type SettingsOverrides,
} from "../schema/settings.js";

/**
 * Merge run-wide defaults with the overrides keyed by `sourceId` (a file
 * basename; lookup is exact). Validates the result and throws ConfigError
 * naming the image when a value is out of range, e.g. a non-positive DPI.
 */
export function resolveSettings(
  sourceId: string,
  defaults: ConversionDefaults,
  overrides: SettingsOverrides = {}
): EffectiveSettings {
  const candidate = {
    pageSizeMm: overrides.pageSizes?.get(sourceId) ?? defaults.pageSizeMm,
    marginsMm: overrides.margins?.get(sourceId) ?? defaults.marginsMm,
    rotationOverride: overrides.rotations?.get(sourceId),
    scaling: defaults.scaling,
    alignH: defaults.alignH,
    alignV: defaults.alignV,
    dpi: defaults.dpi,
    autorotate: defaults.autorotate,
    autoOrient: defaults.autoOrient,
  };

  const result = EffectiveSettingsSchema.safeParse(candidate);
  if (!result.success) {
    throw ConfigError.fromZod(result.error, sourceId);
  }
  return result.data;
}
