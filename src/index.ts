// Constants
export {
  PAGE_SIZES_MM,
  DEFAULT_PAGE_SIZE,
  DEFAULT_DPI,
  DEFAULT_MARGIN_MM,
  IMAGE_EXTENSIONS,
  ORIENTATION_CORRECTION_DEG,
} from "./constants.js";

// Errors
export { PagewrightError, ConfigError, LayoutError, SourceError } from "./errors.js";
export type { ErrorCode, LayoutErrorReason } from "./errors.js";

// Schema types
export type {
  LayoutLength,
  Rect,
  ImageIntrinsics,
  PageGeometry,
  ContentBox,
  LayoutPlanEntry,
  PlannedPage,
} from "./schema/plan.js";
export type {
  ConversionDefaults,
  ConversionDefaultsInput,
  EffectiveSettings,
  Margins,
  PageSize,
  SettingsOverrides,
} from "./schema/settings.js";
export {
  ScalingMode,
  AlignH,
  AlignV,
  Rotation,
  ConversionDefaultsSchema,
  EffectiveSettingsSchema,
  parseDefaults,
  normalizeRotation,
} from "./schema/settings.js";

// Units
export {
  mmToDeviceUnits,
  mmToLayoutUnits,
  devicePixelsToLayoutUnits,
  layoutUnitsToDevicePixels,
  layoutUnitsToMm,
} from "./utils/units.js";

// Settings
export {
  parsePageSize,
  parseMarginValue,
  parseRotationValue,
  parseMapping,
  loadMapping,
} from "./settings/mapping.js";
export type { SkippedEntry, MappingOptions, ValueParser } from "./settings/mapping.js";
export { resolveSettings } from "./settings/resolver.js";

// Layout (core)
export {
  computeLayout,
  effectiveRotation,
  orientationCorrection,
  autoOrientPage,
  scaleToContent,
  alignInBox,
} from "./layout/engine.js";
export { collectSources, planLayout } from "./layout/sequencer.js";
export type { CollectOptions, PlanOptions } from "./layout/sequencer.js";

// Image source
export { readIntrinsics, openRotated } from "./image/source.js";
export type { IntrinsicsReader } from "./image/source.js";

// Renderers
export { createStreamingRenderer } from "./renderer/streaming-renderer.js";
export { createBatchRenderer, rasterizePage } from "./renderer/batch-renderer.js";
export type { PageRenderer, RenderMode, RenderSummary } from "./renderer/types.js";

// Driver
export { convertImagesToPdf } from "./driver/convert-driver.js";
export type { ConvertOptions, ConvertResult } from "./driver/convert-driver.js";

// PDF merge
export { mergePdfs } from "./merge/pdf-merge.js";

// Geometry utilities
export {
  intersectRects,
  insetPage,
  boxWidth,
  boxHeight,
  isEmptyBox,
  boxToRect,
  containsRect,
} from "./utils/geometry.js";
