// Shared by the server and the browser bundle, so no Node imports here.

export type ConversionDirection = 'docx-to-pdf' | 'pdf-to-docx';

export type DocumentFormat = 'docx' | 'pdf';

export interface DirectionFormats {
  source: DocumentFormat;
  target: DocumentFormat;
}

export const CONVERSION_DIRECTIONS: Readonly<Record<ConversionDirection, DirectionFormats>> = {
  'docx-to-pdf': { source: 'docx', target: 'pdf' },
  'pdf-to-docx': { source: 'pdf', target: 'docx' }
};

export const SUPPORTED_DIRECTIONS: readonly ConversionDirection[] = ['docx-to-pdf', 'pdf-to-docx'];

export function isConversionDirection(value: unknown): value is ConversionDirection {
  return typeof value === 'string' && SUPPORTED_DIRECTIONS.some((direction) => direction === value);
}

function baseName(filename: string): string {
  const parts = filename.split(/[\\/]/);
  return parts[parts.length - 1] ?? '';
}

export function getExtension(filename: string): string {
  const name = baseName(filename);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : '';
}

export function hasSourceExtension(filename: string, direction: ConversionDirection): boolean {
  return getExtension(filename) === CONVERSION_DIRECTIONS[direction].source;
}

/**
 * Name a converted file is offered under: the uploaded file's stem with the
 * target extension. Path segments and control characters are dropped.
 */
export function buildDisplayName(filename: string, direction: ConversionDirection): string {
  const name = baseName(filename).replace(/[\u0000-\u001f\u007f]/g, '').trim();
  const dot = name.lastIndexOf('.');
  const stem = (dot > 0 ? name.slice(0, dot) : name).trim() || 'document';
  return `${stem}.${CONVERSION_DIRECTIONS[direction].target}`;
}
