import { STORAGE_ROOT } from './storage';

export type PdfToDocxEngine = 'soffice' | 'pandoc';

export interface AppConfig {
  port: number;
  host: string;
  storageRoot: string;
  sofficePath?: string;
  pandocPath: string;
  pdfToDocxEngine: PdfToDocxEngine;
  conversionTimeoutMs: number;
  maxUploadBytes: number;
}

const DEFAULT_PORT = 5001;
const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

function readNumber(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative number, received "${value}".`);
  }

  return parsed;
}

function readEngine(value: string | undefined): PdfToDocxEngine {
  const normalized = (value ?? '').trim().toLowerCase();

  switch (normalized) {
    case '':
    case 'soffice':
    case 'libreoffice':
      return 'soffice';
    case 'pandoc':
      return 'pandoc';
    default:
      throw new Error(`PDF_TO_DOCX_ENGINE must be "soffice" or "pandoc", received "${value}".`);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const sofficePath = env.SOFFICE_PATH?.trim();

  return {
    port: readNumber(env.PORT, DEFAULT_PORT, 'PORT'),
    host: (env.HOST ?? 'localhost').trim() || 'localhost',
    storageRoot: env.STORAGE_DIR?.trim() || STORAGE_ROOT,
    sofficePath: sofficePath || undefined,
    pandocPath: env.PANDOC_PATH?.trim() || 'pandoc',
    pdfToDocxEngine: readEngine(env.PDF_TO_DOCX_ENGINE),
    conversionTimeoutMs: readNumber(env.CONVERSION_TIMEOUT_MS, 0, 'CONVERSION_TIMEOUT_MS'),
    maxUploadBytes: readNumber(env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES, 'MAX_UPLOAD_BYTES')
  };
}
