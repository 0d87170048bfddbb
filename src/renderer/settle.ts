/**
 * @module renderer/settle
 * @fileoverview The settle heuristic: decide when a page that runs scripts
 * is done changing.
 *
 * 1. Wait for the window's `load` event (skipped when the document is
 *    already `complete`).
 * 2. Observe the whole document with the window's own `MutationObserver`
 *    (child lists and character data). Once no mutation has happened for
 *    `quietMs`, the page is settled.
 * 3. Regardless of mutations, stop after `maxMs`.
 *
 * Neither wait is abortable. Settling runs inside a render worker, and the
 * page timeout ends it by terminating that worker. Timers are Node's, not
 * the page's, so closing the window does not strand a pending wait.
 */

import type { DOMWindow } from "jsdom";

export interface SettleOptions {
  /** Quiet window in ms. */
  quietMs: number;
  /** Cap on the mutation wait in ms. */
  maxMs: number;
}

/**
 * Resolve once the window has fired `load`.
 */
function waitForLoad(window: DOMWindow): Promise<void> {
  return new Promise<void>((resolve) => {
    if (window.document.readyState === "complete") {
      resolve();
      return;
    }
    window.addEventListener("load", () => resolve(), { once: true });
  });
}

/**
 * Resolve once the DOM has been quiet for `quietMs`, or after `maxMs`.
 */
function waitForQuiet(window: DOMWindow, options: SettleOptions): Promise<void> {
  const { quietMs, maxMs } = options;

  return new Promise<void>((resolve) => {
    const observer = new window.MutationObserver(() => {
      clearTimeout(quietTimer);
      quietTimer = setTimeout(done, quietMs);
    });
    const done = (): void => {
      observer.disconnect();
      clearTimeout(quietTimer);
      clearTimeout(maxTimer);
      resolve();
    };

    let quietTimer = setTimeout(done, quietMs);
    const maxTimer = setTimeout(done, maxMs);
    observer.observe(window.document, {
      childList: true,
      characterData: true,
      subtree: true,
    });
  });
}

/**
 * `load`, then the quiet window.
 */
export async function settle(window: DOMWindow, options: SettleOptions): Promise<void> {
  await waitForLoad(window);
  await waitForQuiet(window, options);
}
