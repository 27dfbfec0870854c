import type { PlannedPage } from "../schema/plan.js";

export type RenderMode = "streaming" | "batch";

/** What a finished renderer wrote */
export interface RenderSummary {
  mode: RenderMode;
  pages: number;
}

/**
 * Turns plan entries into document pages, in the order they are added.
 * `finish` completes the document on the output stream; no page may be
 * added afterwards.
 */
export interface PageRenderer {
  readonly mode: RenderMode;
  addPage(page: PlannedPage): Promise<void>;
  finish(): Promise<RenderSummary>;
}
