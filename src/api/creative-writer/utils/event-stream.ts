/**
 * Workflow Event Streaming
 *
 * Writes workflow events to a raw Node response as they are produced, either
 * as newline-delimited JSON or as Server-Sent Events. Honours backpressure
 * and stops the run when the client goes away.
 */

import type { Writable } from 'stream';

import { STREAM_CONFIG } from '../../../ai/creative/config';
import { isTerminalEvent, type WorkflowEvent } from '../../../ai/creative/types';
import { createPrefixedLogger, type Logger } from '../../../utils/logger';

export type StreamFormat = 'ndjson' | 'sse';

export const STREAM_CONTENT_TYPES: Record<StreamFormat, string> = {
  ndjson: 'application/x-ndjson',
  sse: 'text/event-stream',
};

/**
 * SSE when the client asks for `text/event-stream`, NDJSON otherwise.
 */
export function negotiateStreamFormat(accept: string | string[] | undefined): StreamFormat {
  const value = Array.isArray(accept) ? accept.join(',') : accept ?? '';
  return value.toLowerCase().includes(STREAM_CONTENT_TYPES.sse) ? 'sse' : 'ndjson';
}

export function streamHeaders(format: StreamFormat): Record<string, string> {
  return {
    'Content-Type': `${STREAM_CONTENT_TYPES[format]}; charset=utf-8`,
    'Cache-Control': 'no-cache, no-transform',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no', // Disable nginx buffering
  };
}

/**
 * Format an event for NDJSON streaming.
 */
export function formatNdjson(event: WorkflowEvent): string {
  return `${JSON.stringify(event)}\n`;
}

/**
 * Format an event for SSE streaming.
 */
export function formatSse(event: WorkflowEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

export interface PipeOptions {
  readonly format: StreamFormat;
  /** Aborted when the client disconnects */
  readonly abortController?: AbortController;
  /** SSE keep-alive interval; 0 disables (default: STREAM_CONFIG.HEARTBEAT_INTERVAL_MS) */
  readonly heartbeatIntervalMs?: number;
  readonly logger?: Logger;
}

export interface PipeResult {
  /** Events handed to `res.write` */
  readonly eventsWritten: number;
  /** The terminal event, if it was written */
  readonly terminal?: WorkflowEvent;
  /** True when the client went away before the stream ended */
  readonly disconnected: boolean;
}

function isClosed(res: Writable): boolean {
  return res.destroyed || res.writableEnded;
}

/**
 * Resolves on `drain` or `close`, whichever comes first.
 */
function waitForDrainOrClose(res: Writable): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.on('drain', done);
    res.on('close', done);
  });
}

/**
 * Pulls events from the generator and writes each one as soon as it arrives.
 *
 * - When `write()` returns false, no further event is pulled until `drain`.
 * - On `close` (or a write error) pulling stops, the generator is closed and
 *   the abort controller fires. The returned promise never rejects.
 * - Ends the response after the generator finishes.
 */
export async function pipeWorkflowEvents(
  events: AsyncGenerator<WorkflowEvent, void, undefined>,
  res: Writable,
  options: PipeOptions
): Promise<PipeResult> {
  const log = options.logger ?? createPrefixedLogger('[EventStream]');
  const format = options.format === 'sse' ? formatSse : formatNdjson;

  let disconnected = isClosed(res);
  let eventsWritten = 0;
  let terminal: WorkflowEvent | undefined;

  const onClose = () => {
    if (!res.writableEnded) {
      disconnected = true;
      options.abortController?.abort();
    }
  };
  const onError = (error: Error) => {
    log.warn(`Response stream error: ${error.message}`);
    disconnected = true;
    options.abortController?.abort();
  };
  res.on('close', onClose);
  res.on('error', onError);

  let heartbeat: ReturnType<typeof setInterval> | undefined;
  const heartbeatMs = options.heartbeatIntervalMs ?? STREAM_CONFIG.HEARTBEAT_INTERVAL_MS;
  if (options.format === 'sse' && !disconnected) {
    // Establish the connection immediately
    res.write(':ok\n\n');
    if (heartbeatMs > 0) {
      heartbeat = setInterval(() => {
        if (!disconnected && !isClosed(res)) {
          res.write(':heartbeat\n\n');
        }
      }, heartbeatMs);
    }
  }

  try {
    while (!disconnected) {
      const next = await events.next();
      if (next.done || disconnected) break;

      const event = next.value;
      const writable = res.write(format(event));
      eventsWritten++;
      if (isTerminalEvent(event)) {
        terminal = event;
      }

      if (!writable && !disconnected) {
        await waitForDrainOrClose(res);
      }
    }
  } catch (error) {
    log.error(`Workflow stream failed: ${error instanceof Error ? error.message : String(error)}`);
  } finally {
    if (heartbeat) clearInterval(heartbeat);

    if (disconnected) {
      log.info(`Client disconnected after ${eventsWritten} events; stopping run`);
      options.abortController?.abort();
      try {
        await events.return(undefined);
      } catch (error) {
        log.warn(`Closing workflow after disconnect failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    } else if (!res.writableEnded) {
      res.end();
    }

    res.off('close', onClose);
    res.off('error', onError);
  }

  return { eventsWritten, terminal, disconnected };
}
