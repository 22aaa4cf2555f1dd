import type { ConversionDirection } from '../config/formats';

export interface ConversionResponse {
  file_id: string;
  status: 'completed';
  original_name: string;
}

export interface ConverterApi {
  convert(file: File, direction: ConversionDirection): Promise<ConversionResponse>;
  downloadUrl(fileId: string): string;
  bulkDownloadUrl(): string;
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

function readErrorMessage(body: unknown): string | undefined {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }

  return undefined;
}

function isConversionResponse(body: unknown): body is ConversionResponse {
  return typeof body === 'object'
    && body !== null
    && 'file_id' in body
    && typeof body.file_id === 'string'
    && 'original_name' in body
    && typeof body.original_name === 'string';
}

export class HttpConverterApi implements ConverterApi {
  private readonly baseUrl: string;

  constructor(baseUrl = '', private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init)) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async convert(file: File, direction: ConversionDirection): Promise<ConversionResponse> {
    const formData = new FormData();
    formData.append('file', file, file.name);

    const response = await this.fetchImpl(`${this.baseUrl}/convert/${direction}`, {
      method: 'POST',
      body: formData
    });

    const body: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      throw new Error(readErrorMessage(body) ?? 'Conversion failed');
    }

    if (!isConversionResponse(body)) {
      throw new Error('Unexpected response from the conversion service');
    }

    return body;
  }

  downloadUrl(fileId: string): string {
    return `${this.baseUrl}/download/${encodeURIComponent(fileId)}`;
  }

  bulkDownloadUrl(): string {
    return `${this.baseUrl}/download/bulk`;
  }
}
