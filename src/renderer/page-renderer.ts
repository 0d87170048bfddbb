/**
 * @module renderer/page-renderer
 * @fileoverview The page-rendering capability the crawler depends on.
 *
 * A renderer turns a URL into either the rendered page's text and links or
 * a classified failure. It never rejects: every failure is page-local and
 * comes back as a {@link RenderFailure}.
 *
 * {@link JsdomRenderer} is the default backend; tests substitute in-process
 * fakes.
 */

import type { FailedPageStatus } from "../utils/errors.js";

/**
 * Per-call limits.
 */
export interface RenderOptions {
  /** Budget for fetch, script execution and settling together. */
  timeoutMs: number;
  /** Aborts the render early, e.g. when the crawl's run timeout fires. */
  signal?: AbortSignal;
}

/**
 * A page that rendered.
 */
export interface RenderedPage {
  status: "ok";
  /** URL the document was finally served from (after redirects). */
  finalUrl: string;
  title: string;
  /** Whitespace-normalized visible text. */
  text: string;
  /** Canonical, deduplicated absolute link URLs in document order. */
  links: string[];
}

/**
 * A page that did not render.
 */
export interface RenderFailure {
  status: FailedPageStatus;
  /** `"[CODE] message"` describing the failure. */
  detail: string;
}

export type RenderOutcome = RenderedPage | RenderFailure;

export interface PageRenderer {
  render(url: string, options: RenderOptions): Promise<RenderOutcome>;
}
