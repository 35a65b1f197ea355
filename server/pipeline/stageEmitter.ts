export type { StageEvent, StageName, StageStatus } from '../../shared/types';

import type { StageEvent, StageName, StageStatus } from '../../shared/types';

export type StageEventSender = <T>(event: StageEvent<T>) => void;

export interface StagePayload<T> {
  message?: string;
  data?: T;
}

export const makeStageEmitter = (
  runId: string,
  stage: StageName,
  send: StageEventSender,
  now: () => Date = () => new Date(),
) => {
  const emit = <T>(status: StageStatus, payload?: StagePayload<T>) => {
    send({
      runId,
      stage,
      status,
      message: payload?.message,
      data: payload?.data,
      ts: now().toISOString(),
    });
  };

  return {
    start: <T>(payload?: StagePayload<T>) => emit('start', payload),
    progress: <T>(payload?: StagePayload<T>) => emit('progress', payload),
    success: <T>(payload?: StagePayload<T>) => emit('success', payload),
    failure: (error: unknown, options?: { data?: unknown }) => {
      const message = error instanceof Error ? error.message : String(error);
      emit('failure', { message, data: options?.data ?? { error: message } });
    },
  };
};
