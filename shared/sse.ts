import type { StageEvent } from './types';

export interface SseStreamOptions {
  heartbeatMs: number;
  onClose?: () => void;
  onError?: (error: unknown) => void;
}

export interface SseStream {
  controller: AbortController;
  send: <T>(event: StageEvent<T>) => void;
  sendJson: (eventName: string, payload: unknown) => void;
  close: () => void;
}
