/**
 * @module renderer/render-job
 * @fileoverview Messages exchanged with the render worker.
 *
 * A job carries a fetched document into the worker; the worker answers
 * with exactly one reply. Both sides parse what they receive, since
 * `workerData` and `message` payloads arrive untyped.
 */

import { z } from "zod";

export const renderJobSchema = z.object({
  /** Fetched markup. */
  html: z.string(),
  /** Final URL of the document, after redirects. */
  url: z.string(),
  contentType: z.string(),
  /** Sent when page scripts are loaded. */
  userAgent: z.string(),
  settleQuietMs: z.number(),
  settleMaxMs: z.number(),
});

export type RenderJob = z.infer<typeof renderJobSchema>;

export const renderReplySchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("ok"),
    finalUrl: z.string(),
    title: z.string(),
    text: z.string(),
    links: z.array(z.string()),
    /** Message of the first uncaught page-script error, if any. */
    scriptError: z.string().optional(),
  }),
  z.object({
    status: z.literal("failed"),
    message: z.string(),
  }),
]);

export type RenderReply = z.infer<typeof renderReplySchema>;
