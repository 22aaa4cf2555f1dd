export type ConverterErrorCode =
  | 'InvalidRequest'
  | 'InvalidFormat'
  | 'EngineUnavailable'
  | 'ConversionFailed'
  | 'NotFound';

export class ConverterError extends Error {
  constructor(
    readonly code: ConverterErrorCode,
    readonly statusCode: number,
    message: string,
    readonly detail?: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidRequestError extends ConverterError {
  constructor(message: string) {
    super('InvalidRequest', 400, message);
  }
}

export class InvalidFormatError extends ConverterError {
  constructor(message: string) {
    super('InvalidFormat', 400, message);
  }
}

export class EngineUnavailableError extends ConverterError {
  constructor(message: string) {
    super('EngineUnavailable', 503, message);
  }
}

export class ConversionFailedError extends ConverterError {
  constructor(message: string, detail?: string) {
    super('ConversionFailed', 500, message, detail);
  }
}

export class NotFoundError extends ConverterError {
  constructor(message: string) {
    super('NotFound', 404, message);
  }
}

export interface ErrorBody {
  error: string;
  code?: ConverterErrorCode;
}

export interface ErrorResponse {
  statusCode: number;
  body: ErrorBody;
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ConverterError) {
    return {
      statusCode: error.statusCode,
      body: { error: error.message, code: error.code }
    };
  }

  const message = error instanceof Error ? error.message : 'Unknown conversion error.';
  return { statusCode: 500, body: { error: message } };
}
