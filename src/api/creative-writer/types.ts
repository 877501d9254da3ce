import type { IncomingHttpHeaders } from 'http';
import type { Writable } from 'stream';
import { z } from 'zod';

import { CONTEXT_CONSTRAINTS } from '../../ai/creative/config';

/**
 * Raw response the stream is written to (Node's ServerResponse in production).
 */
export type StreamingResponse = Writable & {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
};

/**
 * The slice of Strapi's Koa context the creative writer controller uses.
 */
export interface ControllerContext {
  request: {
    body?: unknown;
    headers: IncomingHttpHeaders;
  };
  params: Record<string, string | undefined>;
  status: number;
  body: unknown;
  /** Set to false to write the raw Node response directly */
  respond?: boolean;
  res: StreamingResponse;
}

const brief = z
  .string()
  .trim()
  .min(CONTEXT_CONSTRAINTS.MIN_LENGTH)
  .max(CONTEXT_CONSTRAINTS.MAX_LENGTH);

export const articleBodySchema = z.object({
  research: brief,
  products: brief,
  assignment: brief,
});

export type ArticleRequestBody = z.infer<typeof articleBodySchema>;

/**
 * Header carrying a caller-chosen run id.
 */
export const CORRELATION_HEADER = 'x-correlation-id';

const RUN_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export function isValidRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}
