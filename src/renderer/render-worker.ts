/**
 * @module renderer/render-worker
 * @fileoverview Worker-thread entry point that runs one page in jsdom.
 *
 * Page scripts run on this thread's event loop, never the crawler's. A
 * script that never yields stalls only this worker, and the renderer
 * terminates it when the page timeout or the run timeout fires.
 *
 * ```
 *   workerData (RenderJob)
 *     |
 *     +--> new JSDOM(html, { runScripts: "dangerously", pretendToBeVisual })
 *     +--> settle()
 *     +--> dom.serialize() --> extractPageText() + extractLinks()
 *     |
 *     +--> postMessage(RenderReply)
 * ```
 */

import { parentPort, workerData } from "node:worker_threads";
import {
  JSDOM,
  ResourceLoader,
  VirtualConsole,
  type AbortablePromise,
  type FetchOptions as ResourceFetchOptions,
} from "jsdom";
import { extractLinks } from "../crawler/link-resolver.js";
import { extractPageText } from "../extractor/text-extractor.js";
import { renderJobSchema, type RenderJob, type RenderReply } from "./render-job.js";
import { settle } from "./settle.js";

/**
 * Loads `<script src>` only. Stylesheets, images, frames and the like are
 * never requested: they cannot change the text of the page.
 */
class ScriptOnlyResourceLoader extends ResourceLoader {
  fetch(url: string, options: ResourceFetchOptions): AbortablePromise<Buffer> | null {
    if (options.element?.localName !== "script") {
      return null;
    }
    return super.fetch(url, options);
  }
}

/**
 * Whether a virtual-console error is an uncaught exception from page code,
 * as opposed to "not implemented" notices or failed resource loads.
 */
function isUncaughtScriptError(error: Error): boolean {
  if ("type" in error && typeof error.type === "string") {
    return error.type === "unhandled exception";
  }
  return error.message.startsWith("Uncaught");
}

async function renderJob(job: RenderJob): Promise<RenderReply> {
  let scriptError: string | undefined;
  const virtualConsole = new VirtualConsole();
  virtualConsole.on("jsdomError", (error) => {
    if (isUncaughtScriptError(error)) {
      scriptError ??= error.message;
    }
  });

  let dom: JSDOM;
  try {
    dom = new JSDOM(job.html, {
      url: job.url,
      contentType: job.contentType,
      runScripts: "dangerously",
      pretendToBeVisual: true,
      resources: new ScriptOnlyResourceLoader({ userAgent: job.userAgent }),
      virtualConsole,
    });
  } catch (error) {
    return {
      status: "failed",
      message: `Could not build DOM for ${job.url}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  try {
    await settle(dom.window, { quietMs: job.settleQuietMs, maxMs: job.settleMaxMs });

    const html = dom.serialize();
    const { title, text } = extractPageText(html);
    return {
      status: "ok",
      finalUrl: job.url,
      title,
      text,
      links: extractLinks(html, job.url),
      scriptError,
    };
  } finally {
    dom.window.close();
  }
}

if (parentPort) {
  parentPort.postMessage(await renderJob(renderJobSchema.parse(workerData)));
}
