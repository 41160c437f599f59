export type ServiceErrorCode = 'NOT_FOUND' | 'VALIDATION_ERROR' | 'CONFLICT' | 'UNAVAILABLE';

type ServiceErrorStatus = 400 | 404 | 409 | 503;

const STATUS_BY_CODE: Record<ServiceErrorCode, ServiceErrorStatus> = {
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  CONFLICT: 409,
  UNAVAILABLE: 503,
};

export class ServiceError extends Error {
  code: ServiceErrorCode;
  status: ServiceErrorStatus;

  constructor(code: ServiceErrorCode, message: string) {
    super(message);
    this.name = 'ServiceError';
    this.code = code;
    this.status = STATUS_BY_CODE[code];
  }
}

export const isServiceError = (error: unknown): error is ServiceError => error instanceof ServiceError;

export const notFound = (message: string) => new ServiceError('NOT_FOUND', message);
