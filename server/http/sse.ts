import type { Response } from 'express';
import type { SseStream, SseStreamOptions } from '../../shared/sse';

/**
 * Turns an express response into a server-sent event stream. The stream's
 * controller aborts when the client goes away, so long runs can stop early.
 */
export const createSseStream = (res: Response, options: SseStreamOptions): SseStream => {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders();

  const controller = new AbortController();
  let closed = false;

  const report = (error: unknown) => {
    options.onError?.(error);
  };

  const heartbeat = setInterval(() => {
    if (closed) {
      return;
    }
    try {
      res.write(': heartbeat\n\n');
    } catch (error) {
      report(error);
    }
  }, options.heartbeatMs);

  const close = () => {
    if (closed) {
      return;
    }
    closed = true;
    clearInterval(heartbeat);
    controller.abort();
    try {
      res.end();
    } catch (error) {
      report(error);
    }
    try {
      options.onClose?.();
    } catch (error) {
      report(error);
    }
  };

  res.on('close', close);

  const writeFrame = (eventName: string, payload: unknown) => {
    if (closed) {
      return;
    }

    const text = typeof payload === 'string' ? payload : JSON.stringify(payload);
    // every payload line needs its own data: prefix
    const data = text
      .split(/\r?\n/)
      .map((line) => `data: ${line}`)
      .join('\n');

    try {
      res.write(`event: ${eventName}\n${data}\n\n`);
    } catch (error) {
      close();
      throw error;
    }
  };

  return {
    controller,
    send: (event) => writeFrame('stage-event', event),
    sendJson: (eventName, payload) => writeFrame(eventName, payload),
    close,
  };
};
