import type { ContentBox, PageGeometry, Rect } from "../schema/plan.js";

/** Per-side insets, same order as CSS margins */
export interface Insets {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/** Compute the intersection of two rects, or null if they don't intersect */
export function intersectRects(a: Rect, b: Rect): Rect | null {
  const x = Math.max(a.x, b.x);
  const y = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.w, b.x + b.w);
  const bottom = Math.min(a.y + a.h, b.y + b.h);
  const w = right - x;
  const h = bottom - y;
  if (w <= 0 || h <= 0) return null;
  return { x, y, w, h };
}

/** Page box shrunk by `insets`. May be degenerate; check with isEmptyBox. */
export function insetPage(page: PageGeometry, insets: Insets): ContentBox {
  return {
    x0: insets.left,
    y0: insets.top,
    x1: page.w - insets.right,
    y1: page.h - insets.bottom,
  };
}

export function boxWidth(box: ContentBox): number {
  return box.x1 - box.x0;
}

export function boxHeight(box: ContentBox): number {
  return box.y1 - box.y0;
}

/** True when the box has no positive area */
export function isEmptyBox(box: ContentBox): boolean {
  return boxWidth(box) <= 0 || boxHeight(box) <= 0;
}

export function boxToRect(box: ContentBox): Rect {
  return { x: box.x0, y: box.y0, w: boxWidth(box), h: boxHeight(box) };
}

/** Check whether `inner` lies inside `outer`, with tolerance `eps` on each edge */
export function containsRect(outer: Rect, inner: Rect, eps: number = 0): boolean {
  return (
    inner.x >= outer.x - eps &&
    inner.y >= outer.y - eps &&
    inner.x + inner.w <= outer.x + outer.w + eps &&
    inner.y + inner.h <= outer.y + outer.h + eps
  );
}
