import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../logger';

export const PROBLEM_TYPE_BASE = 'urn:survey-defect-analyzer:problem';

export interface RFC7807ProblemDetail {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  errors?: Array<{ path: string; message: string }>;
  traceId?: string;
  timestamp?: string;
}

function getRequestId(req: Request): string | undefined {
  const requestId = req.id ?? req.headers['x-request-id'] ?? req.headers['x-correlation-id'];
  return requestId ? String(requestId) : undefined;
}

export abstract class APIError extends Error {
  abstract readonly status: number;
  abstract readonly type: string;
  abstract readonly title: string;
  readonly detail?: string;
  readonly errors?: Array<{ path: string; message: string }>;

  constructor(message: string, detail?: string, errors?: Array<{ path: string; message: string }>) {
    super(message);
    this.name = this.constructor.name;
    this.detail = detail;
    this.errors = errors;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toRFC7807(req: Request): RFC7807ProblemDetail {
    return {
      type: `${PROBLEM_TYPE_BASE}:${this.type}`,
      title: this.title,
      status: this.status,
      detail: this.detail || this.message,
      instance: req.originalUrl,
      errors: this.errors,
      traceId: getRequestId(req),
      timestamp: new Date().toISOString(),
    };
  }
}

export class BadRequestError extends APIError {
  readonly status = 400;
  readonly type = 'bad-request';
  readonly title = 'Bad Request';

  constructor(detail?: string, errors?: Array<{ path: string; message: string }>) {
    super('Bad Request', detail, errors);
  }
}

export class ValidationError extends APIError {
  readonly status = 400;
  readonly type = 'validation-error';
  readonly title = 'Validation Error';

  constructor(detail?: string, errors?: Array<{ path: string; message: string }>) {
    super('Validation Error', detail, errors);
  }

  static fromZodError(error: ZodError): ValidationError {
    const errors = error.errors.map(e => ({
      path: e.path.join('.'),
      message: e.message,
    }));
    return new ValidationError('Request validation failed', errors);
  }
}

export class NotFoundError extends APIError {
  readonly status = 404;
  readonly type = 'not-found';
  readonly title = 'Not Found';

  constructor(resource?: string) {
    const detail = resource ? `${resource} not found` : 'Resource not found';
    super('Not Found', detail);
  }
}

export class TooManyRequestsError extends APIError {
  readonly status = 429;
  readonly type = 'rate-limit-exceeded';
  readonly title = 'Too Many Requests';
  readonly retryAfter?: number;

  constructor(detail: string = 'Rate limit exceeded', retryAfter?: number) {
    super('Too Many Requests', detail);
    this.retryAfter = retryAfter;
  }

  override toRFC7807(req: Request): RFC7807ProblemDetail & { retryAfter?: number } {
    const base = super.toRFC7807(req);
    return this.retryAfter ? { ...base, retryAfter: this.retryAfter } : base;
  }
}

export class InternalServerError extends APIError {
  readonly status = 500;
  readonly type = 'internal-error';
  readonly title = 'Internal Server Error';

  constructor(detail: string = 'An unexpected error occurred') {
    super('Internal Server Error', detail);
  }
}

export class ServiceUnavailableError extends APIError {
  readonly status = 503;
  readonly type = 'service-unavailable';
  readonly title = 'Service Unavailable';

  constructor(detail: string = 'Service temporarily unavailable') {
    super('Service Unavailable', detail);
  }
}

export class UnprocessableEntityError extends APIError {
  readonly status = 422;
  readonly type = 'unprocessable-entity';
  readonly title = 'Unprocessable Entity';

  constructor(detail?: string, errors?: Array<{ path: string; message: string }>) {
    super('Unprocessable Entity', detail || 'The request was well-formed but contains semantic errors', errors);
  }
}

/** The uploaded bytes claim a supported format but could not be decoded into text. */
export class DocumentDecodingError extends APIError {
  readonly status = 422;
  readonly type = 'document-decoding-error';
  readonly title = 'Document Decoding Error';
  readonly format: string;

  constructor(format: string, detail?: string) {
    super('Document Decoding Error', detail || `Failed to decode ${format} document`);
    this.format = format;
  }
}

export class UnsupportedMediaTypeError extends APIError {
  readonly status = 415;
  readonly type = 'unsupported-media-type';
  readonly title = 'Unsupported Media Type';

  constructor(detail: string = 'The media type is not supported') {
    super('Unsupported Media Type', detail);
  }
}

export class PayloadTooLargeError extends APIError {
  readonly status = 413;
  readonly type = 'payload-too-large';
  readonly title = 'Payload Too Large';

  constructor(detail: string = 'The request payload is too large') {
    super('Payload Too Large', detail);
  }
}

interface BodyParserError extends Error {
  type: string;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return 'type' in err && typeof err.type === 'string';
}

/** Maps errors raised by express' body parsers onto the problem types above. */
function fromBodyParserError(err: Error): APIError | null {
  if (!isBodyParserError(err)) return null;
  switch (err.type) {
    case 'entity.too.large':
      return new PayloadTooLargeError();
    case 'entity.parse.failed':
      return new BadRequestError('Malformed JSON body');
    case 'encoding.unsupported':
    case 'charset.unsupported':
      return new UnsupportedMediaTypeError(err.message);
    default:
      return null;
  }
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = getRequestId(req);
  const apiError = err instanceof APIError ? err : fromBodyParserError(err);

  if (apiError) {
    const problemDetail = apiError.toRFC7807(req);

    if (apiError.status >= 500) {
      logger.error({ err, requestId, path: req.path }, apiError.message);
    } else {
      logger.warn({ err, requestId, path: req.path }, apiError.message);
    }

    res.status(apiError.status).json(problemDetail);
    return;
  }

  if (err instanceof ZodError) {
    const validationError = ValidationError.fromZodError(err);
    const problemDetail = validationError.toRFC7807(req);

    logger.warn({ err, requestId, path: req.path }, 'Validation error');
    res.status(400).json(problemDetail);
    return;
  }

  logger.error({ err, requestId, path: req.path, stack: err.stack }, 'Unhandled error');

  const problemDetail: RFC7807ProblemDetail = {
    type: `${PROBLEM_TYPE_BASE}:internal-error`,
    title: 'Internal Server Error',
    status: 500,
    detail: process.env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
    instance: req.originalUrl,
    traceId: requestId,
    timestamp: new Date().toISOString(),
  };

  res.status(500).json(problemDetail);
}

export function asyncHandler<T extends Request = Request>(
  fn: (req: T, res: Response, next: NextFunction) => Promise<void>
): (req: T, res: Response, next: NextFunction) => void {
  return (req: T, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  const problemDetail: RFC7807ProblemDetail = {
    type: `${PROBLEM_TYPE_BASE}:not-found`,
    title: 'Not Found',
    status: 404,
    detail: `Route ${req.method} ${req.path} not found`,
    instance: req.originalUrl,
    timestamp: new Date().toISOString(),
  };
  res.status(404).json(problemDetail);
}

export function mapDatabaseError(error: unknown, resource: string): APIError {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err.message.includes('ECONNREFUSED') || err.message.includes('connection')) {
    return new ServiceUnavailableError('Database unavailable');
  }

  if (err.message.includes('foreign key') || err.message.includes('FOREIGN KEY')) {
    return new BadRequestError(`Invalid reference for ${resource}`);
  }

  return new InternalServerError(`Failed to process ${resource}`);
}
