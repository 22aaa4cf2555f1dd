import type { ConverterApi } from './api';
import { type ProgressSimulator, startSimulatedProgress } from './progress';
import { clearQueue, markCompleted, markError, markProcessing, setProgress } from './state';
import type { ConverterState, QueuedFile } from './types';

export interface BatchListener {
  /** Structural change: statuses, queue or converted list. */
  onChange(state: ConverterState): void;
  /** Progress-only change for one item. */
  onProgress(item: QueuedFile): void;
  onError?(item: QueuedFile, message: string): void;
}

export interface BatchOptions {
  simulateProgress?: ProgressSimulator;
}

export async function convertFile(
  state: ConverterState,
  item: QueuedFile,
  api: ConverterApi,
  listener: BatchListener,
  options: BatchOptions = {}
): Promise<void> {
  const simulateProgress = options.simulateProgress ?? startSimulatedProgress;
  const direction = state.direction;

  markProcessing(item);
  listener.onChange(state);

  const stopProgress = simulateProgress((progress) => {
    setProgress(item, progress);
    listener.onProgress(item);
  });

  try {
    const result = await api.convert(item.file, direction);
    stopProgress();
    markCompleted(state, item, result.file_id, result.original_name);
  } catch (error) {
    stopProgress();
    const message = error instanceof Error ? error.message : 'Conversion failed';
    markError(state, item, message);
    listener.onError?.(item, message);
  }

  listener.onChange(state);
}

/**
 * Sends every queued file at once and waits for all of them to settle.
 * The queue is cleared afterwards whatever the individual outcomes.
 */
export async function convertAll(
  state: ConverterState,
  api: ConverterApi,
  listener: BatchListener,
  options: BatchOptions = {}
): Promise<void> {
  if (state.converting || state.queue.length === 0) {
    return;
  }

  state.converting = true;
  state.failures = [];
  listener.onChange(state);

  const batch = [...state.queue];
  try {
    await Promise.allSettled(batch.map((item) => convertFile(state, item, api, listener, options)));
  } finally {
    state.converting = false;
    clearQueue(state);
    listener.onChange(state);
  }
}
