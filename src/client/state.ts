import { type ConversionDirection, hasSourceExtension } from '../config/formats';
import { generateId } from './format';
import type { ConvertedFile, ConverterState, QueuedFile } from './types';

export interface AddFilesResult {
  added: QueuedFile[];
  rejected: File[];
}

export function createConverterState(direction: ConversionDirection = 'docx-to-pdf'): ConverterState {
  return {
    direction,
    queue: [],
    converted: [],
    failures: [],
    converting: false
  };
}

/** Queues the files whose extension matches the current direction. */
export function addFiles(state: ConverterState, files: readonly File[], createId: () => string = generateId): AddFilesResult {
  const added: QueuedFile[] = [];
  const rejected: File[] = [];

  for (const file of files) {
    if (!hasSourceExtension(file.name, state.direction)) {
      rejected.push(file);
      continue;
    }

    added.push({
      id: createId(),
      file,
      name: file.name,
      size: file.size,
      status: 'queued'
    });
  }

  state.queue.push(...added);
  return { added, rejected };
}

export function removeFile(state: ConverterState, id: string): boolean {
  if (state.converting) {
    return false;
  }

  const before = state.queue.length;
  state.queue = state.queue.filter((item) => item.id !== id);
  return state.queue.length !== before;
}

/** Switching direction drops the queue; refused while a batch is running. */
export function setDirection(state: ConverterState, direction: ConversionDirection): boolean {
  if (state.converting) {
    return false;
  }

  state.direction = direction;
  state.queue = [];
  return true;
}

export function markProcessing(item: QueuedFile): void {
  item.status = 'processing';
  item.progress = 0;
  item.error = undefined;
}

export function setProgress(item: QueuedFile, progress: number): void {
  if (item.status !== 'processing') {
    return;
  }

  item.progress = Math.max(0, Math.min(100, progress));
}

export function markCompleted(state: ConverterState, item: QueuedFile, fileId: string, convertedName: string, createId: () => string = generateId): ConvertedFile {
  item.status = 'completed';
  item.progress = 100;

  const converted: ConvertedFile = {
    id: createId(),
    fileId,
    name: convertedName,
    size: item.size
  };

  state.converted.push(converted);
  return converted;
}

export function markError(state: ConverterState, item: QueuedFile, message: string): void {
  item.status = 'error';
  item.error = message;
  state.failures.push({ name: item.name, message });
}

export function clearQueue(state: ConverterState): void {
  state.queue = [];
}
