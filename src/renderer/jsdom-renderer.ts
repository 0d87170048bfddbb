/**
 * @module renderer/jsdom-renderer
 * @fileoverview Default {@link PageRenderer}: fetch the document, run its
 * scripts in jsdom on a worker thread, wait for the DOM to settle, then
 * extract text and links from the serialized result.
 *
 * ## Render Pipeline
 * ```
 *   render(url, { timeoutMs, signal })
 *     |
 *     +--> fetchDocument()            FetchError / ContentTypeError / ...
 *     |
 *     +--> new Worker(render-worker)  --- worker thread -------------------
 *     |      workerData: RenderJob    new JSDOM(html, {
 *     |                                  runScripts: "dangerously",
 *     |                                  pretendToBeVisual: true })
 *     |                                settle()
 *     |                                extractPageText() + extractLinks()
 *     |      <-- RenderReply          ----------------------------------------
 *     |
 *     +--> finally: worker.terminate()
 * ```
 *
 * The fetch and the worker share one abort signal that fires on the page
 * timeout (reason: `TimeoutError`) or when the caller's signal aborts
 * (reason: whatever the caller aborted with, normally `RunTimeoutError`).
 * Aborting terminates the worker, which stops page scripts even when they
 * never yield (`while (true) {}`), so the crawl's own timers keep running.
 *
 * ## Page script errors
 * jsdom reports uncaught page-script exceptions on its virtual console. In
 * strict mode the first one turns the page into a `render_error`; otherwise
 * it is logged and the page is extracted as far as it got. Page `console`
 * output is never forwarded, since stdout carries the MCP protocol.
 *
 * ## Worker entry
 * Built code starts `render-worker.js` next to this file. Under the test
 * runner this file is TypeScript, so the worker gets `render-worker.ts` and
 * the tsx loader.
 */

import { extname } from "node:path";
import { fileURLToPath } from "node:url";
import { Worker } from "node:worker_threads";
import { config } from "../config.js";
import { fetchDocument, type DocumentFetcher } from "../services/fetch.js";
import {
  CrawlerError,
  RenderError,
  TimeoutError,
  formatErrorForMcp,
  pageStatusFor,
} from "../utils/errors.js";
import type {
  PageRenderer,
  RenderOptions,
  RenderOutcome,
  RenderedPage,
} from "./page-renderer.js";
import { renderReplySchema, type RenderJob, type RenderReply } from "./render-job.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface JsdomRendererOptions {
  /** Document fetcher; tests pass an in-process stand-in. */
  fetchDocument?: DocumentFetcher;
  /** @default config.userAgent */
  userAgent?: string;
  /** @default config.maxResponseSize */
  maxResponseSize?: number;
  /** @default config.settleQuietMs */
  settleQuietMs?: number;
  /** @default config.settleMaxMs */
  settleMaxMs?: number;
  /** @default config.strictScripts */
  strictScripts?: boolean;
  /** @default config.verbose */
  verbose?: boolean;
}

// ---------------------------------------------------------------------------
// Worker
// ---------------------------------------------------------------------------

const MODULE_EXTENSION = extname(fileURLToPath(import.meta.url));
const WORKER_URL = new URL(`./render-worker${MODULE_EXTENSION}`, import.meta.url);
const WORKER_EXEC_ARGV = MODULE_EXTENSION === ".ts" ? ["--import", "tsx"] : [];

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run one job on a fresh worker. Resolves with the worker's reply and
 * rejects with `signal.reason` on abort; the worker is terminated either
 * way.
 */
function runInWorker(job: RenderJob, signal: AbortSignal): Promise<RenderReply> {
  return new Promise<RenderReply>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const worker = new Worker(WORKER_URL, { workerData: job, execArgv: WORKER_EXEC_ARGV });
    let finished = false;

    const finish = (settleWith: () => void): void => {
      if (finished) {
        return;
      }
      finished = true;
      signal.removeEventListener("abort", onAbort);
      settleWith();
      worker.terminate().catch((error: unknown) => {
        console.error(`[jsdom-renderer] Could not stop render worker: ${errorMessage(error)}`);
      });
    };
    const onAbort = (): void => finish(() => reject(signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });

    worker.once("message", (message: unknown) => {
      const reply = renderReplySchema.safeParse(message);
      finish(() =>
        reply.success
          ? resolve(reply.data)
          : reject(new RenderError(`Render worker sent a malformed reply for ${job.url}`)),
      );
    });
    worker.once("error", (error: Error) => {
      finish(() => reject(new RenderError(`Render worker failed on ${job.url}: ${error.message}`)));
    });
    worker.once("exit", (code: number) => {
      finish(() => reject(new RenderError(`Render worker for ${job.url} exited with code ${code}`)));
    });
  });
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

/**
 * jsdom-backed renderer.
 *
 * @example
 * ```ts
 * const renderer = new JsdomRenderer();
 * const outcome = await renderer.render("https://example.com", { timeoutMs: 20_000 });
 * if (outcome.status === "ok") {
 *   console.error(outcome.title, outcome.links.length);
 * }
 * ```
 */
export class JsdomRenderer implements PageRenderer {
  private readonly fetchDocument: DocumentFetcher;
  private readonly userAgent: string;
  private readonly maxResponseSize: number;
  private readonly settleQuietMs: number;
  private readonly settleMaxMs: number;
  private readonly strictScripts: boolean;
  private readonly verbose: boolean;

  constructor(options: JsdomRendererOptions = {}) {
    this.fetchDocument = options.fetchDocument ?? fetchDocument;
    this.userAgent = options.userAgent ?? config.userAgent;
    this.maxResponseSize = options.maxResponseSize ?? config.maxResponseSize;
    this.settleQuietMs = options.settleQuietMs ?? config.settleQuietMs;
    this.settleMaxMs = options.settleMaxMs ?? config.settleMaxMs;
    this.strictScripts = options.strictScripts ?? config.strictScripts;
    this.verbose = options.verbose ?? config.verbose;
  }

  async render(url: string, options: RenderOptions): Promise<RenderOutcome> {
    const controller = new AbortController();
    const { signal: parentSignal, timeoutMs } = options;

    const timer = setTimeout(() => {
      controller.abort(new TimeoutError(`Rendering ${url} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const onParentAbort = (): void => controller.abort(parentSignal?.reason);
    if (parentSignal?.aborted) {
      onParentAbort();
    } else {
      parentSignal?.addEventListener("abort", onParentAbort, { once: true });
    }

    try {
      return await this.renderPage(url, controller.signal);
    } catch (error) {
      const cause =
        controller.signal.aborted && !(error instanceof CrawlerError)
          ? controller.signal.reason
          : error;
      return { status: pageStatusFor(cause), detail: formatErrorForMcp(cause) };
    } finally {
      clearTimeout(timer);
      parentSignal?.removeEventListener("abort", onParentAbort);
    }
  }

  private async renderPage(url: string, signal: AbortSignal): Promise<RenderedPage> {
    const document = await this.fetchDocument(url, {
      signal,
      userAgent: this.userAgent,
      maxResponseSize: this.maxResponseSize,
    });

    const reply = await runInWorker(
      {
        html: document.html,
        url: document.url,
        contentType: document.contentType,
        userAgent: this.userAgent,
        settleQuietMs: this.settleQuietMs,
        settleMaxMs: this.settleMaxMs,
      },
      signal,
    );

    if (reply.status === "failed") {
      throw new RenderError(reply.message);
    }

    const { scriptError, ...page } = reply;
    if (scriptError !== undefined) {
      if (this.strictScripts) {
        throw new RenderError(`Page script failed on ${page.finalUrl}: ${scriptError}`);
      }
      console.error(`[jsdom-renderer] Script error on ${url}: ${scriptError}`);
    }

    if (this.verbose) {
      console.error(
        `[jsdom-renderer] Rendered ${url} (${page.text.length} chars, ${page.links.length} links)`,
      );
    }

    return page;
  }
}
