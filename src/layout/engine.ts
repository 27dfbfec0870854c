import { ORIENTATION_CORRECTION_DEG } from "../constants.js";
import { LayoutError } from "../errors.js";
import type { EffectiveSettings, PageSize, Rotation } from "../schema/settings.js";
import { normalizeRotation } from "../schema/settings.js";
import type {
  ContentBox,
  ImageIntrinsics,
  LayoutPlanEntry,
  PageGeometry,
  Rect,
} from "../schema/plan.js";
import { boxHeight, boxWidth, insetPage, isEmptyBox } from "../utils/geometry.js";
import { devicePixelsToLayoutUnits, mmToLayoutUnits } from "../utils/units.js";

interface Size {
  w: number;
  h: number;
}

/** Clockwise correction for an EXIF orientation tag; 0 for identity or unknown tags */
export function orientationCorrection(orientation: number | undefined): Rotation {
  if (orientation === undefined) return 0;
  return normalizeRotation(ORIENTATION_CORRECTION_DEG.get(orientation) ?? 0) ?? 0;
}

/**
 * Net clockwise rotation: EXIF correction (when autorotate is on) first,
 * then the explicit override.
 */
export function effectiveRotation(
  intrinsics: ImageIntrinsics,
  settings: Pick<EffectiveSettings, "autorotate" | "rotationOverride">
): Rotation {
  const correction = settings.autorotate ? orientationCorrection(intrinsics.orientation) : 0;
  return normalizeRotation(correction + (settings.rotationOverride ?? 0)) ?? 0;
}

/** Width / height, or 1.0 when the height is zero */
export function aspectRatio(size: Size): number {
  return size.h !== 0 ? size.w / size.h : 1.0;
}

/**
 * Swap the page axes when image and page disagree on landscape vs portrait.
 * A ratio of exactly 1 is neither and never triggers a swap.
 */
export function autoOrientPage(image: Size, page: PageSize): PageSize {
  const imgRatio = aspectRatio(image);
  const pageRatio = aspectRatio(page);
  if ((imgRatio > 1 && pageRatio < 1) || (imgRatio < 1 && pageRatio > 1)) {
    return { w: page.h, h: page.w };
  }
  return page;
}

/** Target size of the image for a scaling mode, all lengths in layout units */
export function scaleToContent(
  image: Size,
  content: Size,
  mode: EffectiveSettings["scaling"]
): Size {
  switch (mode) {
    case "original":
      return { w: image.w, h: image.h };
    case "stretch":
      return { w: content.w, h: content.h };
    case "fit":
    case "fill": {
      const ratioImg = aspectRatio(image);
      const ratioContent = aspectRatio(content);
      // fit binds on the axis the image is wider on; fill binds on the other
      const widthBound = mode === "fit" ? ratioImg > ratioContent : ratioImg < ratioContent;
      return widthBound
        ? { w: content.w, h: content.w / ratioImg }
        : { w: content.h * ratioImg, h: content.h };
    }
  }
}

/** Position a target size inside the content box by alignment */
export function alignInBox(
  size: Size,
  box: ContentBox,
  alignH: EffectiveSettings["alignH"],
  alignV: EffectiveSettings["alignV"]
): Rect {
  let x: number;
  switch (alignH) {
    case "left":
      x = box.x0;
      break;
    case "right":
      x = box.x1 - size.w;
      break;
    case "center":
      x = box.x0 + (boxWidth(box) - size.w) / 2;
      break;
  }

  let y: number;
  switch (alignV) {
    case "top":
      y = box.y0;
      break;
    case "bottom":
      y = box.y1 - size.h;
      break;
    case "center":
      y = box.y0 + (boxHeight(box) - size.h) / 2;
      break;
  }

  return { x, y, w: size.w, h: size.h };
}

/**
 * Lay out one image on its page. Pure: reads nothing but its arguments and
 * returns value data shared by every renderer.
 * Throws LayoutError(MARGINS_EXCEED_PAGE) when margins leave no content area.
 */
export function computeLayout(
  sourceId: string,
  intrinsics: ImageIntrinsics,
  settings: EffectiveSettings
): LayoutPlanEntry {
  // 1-2. orientation correction + override
  const rotation = effectiveRotation(intrinsics, settings);
  const quarterTurn = rotation === 90 || rotation === 270;
  const pixels: Size = quarterTurn
    ? { w: intrinsics.pixelHeight, h: intrinsics.pixelWidth }
    : { w: intrinsics.pixelWidth, h: intrinsics.pixelHeight };

  // 3-4. page size, possibly swapped to match the image
  const pageMm = settings.autoOrient
    ? autoOrientPage(pixels, settings.pageSizeMm)
    : settings.pageSizeMm;

  // 5. everything into layout units
  const page: PageGeometry = {
    w: mmToLayoutUnits(pageMm.w),
    h: mmToLayoutUnits(pageMm.h),
  };
  const m = settings.marginsMm;
  const insets = {
    top: mmToLayoutUnits(m.top),
    right: mmToLayoutUnits(m.right),
    bottom: mmToLayoutUnits(m.bottom),
    left: mmToLayoutUnits(m.left),
  };
  const image: Size = {
    w: devicePixelsToLayoutUnits(pixels.w, settings.dpi),
    h: devicePixelsToLayoutUnits(pixels.h, settings.dpi),
  };

  // 6. content box
  const contentBox = insetPage(page, insets);
  if (isEmptyBox(contentBox)) {
    throw new LayoutError(
      "MARGINS_EXCEED_PAGE",
      sourceId,
      `Margins too large for page size for ${sourceId}`
    );
  }

  // 7-8. scale, then align
  const target = scaleToContent(
    image,
    { w: boxWidth(contentBox), h: boxHeight(contentBox) },
    settings.scaling
  );
  const placed = alignInBox(target, contentBox, settings.alignH, settings.alignV);

  return {
    sourceId,
    page,
    contentBox,
    placed,
    rotation,
    pixelWidth: pixels.w,
    pixelHeight: pixels.h,
    dpi: settings.dpi,
  };
}
