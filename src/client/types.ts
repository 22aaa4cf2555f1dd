import type { ConversionDirection } from '../config/formats';

export type QueuedFileStatus = 'queued' | 'processing' | 'completed' | 'error';

export interface QueuedFile {
  id: string;
  file: File;
  name: string;
  size: number;
  status: QueuedFileStatus;
  /** 0–100, simulated locally while the request is in flight. */
  progress?: number;
  error?: string;
}

export interface ConvertedFile {
  id: string;
  /** Identifier issued by the server; the only handle for downloading. */
  fileId: string;
  name: string;
  size: number;
}

export interface ConversionFailure {
  name: string;
  message: string;
}

export interface ConverterState {
  direction: ConversionDirection;
  queue: QueuedFile[];
  converted: ConvertedFile[];
  failures: ConversionFailure[];
  converting: boolean;
}
