import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { PolicyDocumentError } from '../../document/errors.js';
import { ValueTreeError } from '../../types/value-tree.js';

export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
}

const FASTIFY_VALIDATION_CODE = 'FST_ERR_VALIDATION';
const INVALID_POLICY_DOCUMENT_CODE = 'INVALID_POLICY_DOCUMENT';
const JSON_PARSE_ERROR_CODES = [
  'FST_ERR_CTP_INVALID_CONTENT_LENGTH',
  'FST_ERR_CTP_INVALID_MEDIA_TYPE',
  'FST_ERR_CTP_INVALID_JSON_BODY',
  'FST_ERR_CTP_EMPTY_JSON_BODY'
];

function isFastifyValidationError(error: FastifyError): boolean {
  return error.code === FASTIFY_VALIDATION_CODE || error.validation !== undefined;
}

function isJsonParseError(error: FastifyError): boolean {
  return error instanceof SyntaxError || JSON_PARSE_ERROR_CODES.includes(error.code);
}

function isPolicyDocumentError(error: unknown): boolean {
  return error instanceof PolicyDocumentError || error instanceof ValueTreeError;
}

function extractValidationDetails(error: FastifyError): unknown {
  if (!error.validation) {
    return undefined;
  }
  return error.validation.map((v) => ({
    field: v.instancePath || v.params['missingProperty'] || 'unknown',
    message: v.message,
    keyword: v.keyword
  }));
}

function formatValidationMessage(error: FastifyError): string {
  if (!error.validation) {
    return 'Request validation failed';
  }

  const messages = error.validation.map((v) => {
    // /query/field -> query.field
    const field = v.instancePath.replace(/^\//, '').replace(/\//g, '.');
    const label = error.validationContext ? `${error.validationContext}${field ? `.${field}` : ''}` : field;

    if (v.keyword === 'required') {
      return `Missing required field: ${String(v.params['missingProperty'])}`;
    }
    if (v.keyword === 'enum') {
      const allowed = v.params['allowedValues'];
      return Array.isArray(allowed)
        ? `Field ${label} must be one of: ${allowed.join(', ')}`
        : `Field ${label} ${v.message ?? 'is invalid'}`;
    }
    if (v.keyword === 'type') {
      return `Field ${label} ${v.message ?? 'has invalid type'}`;
    }
    if (v.keyword === 'additionalProperties') {
      return `Unknown field: ${String(v.params['additionalProperty'])}`;
    }

    return v.message ?? 'Validation error';
  });

  return messages.join('; ');
}

function detailsOf(error: Error): unknown {
  return 'details' in error ? error.details : undefined;
}

export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  let statusCode = error.statusCode ?? 500;
  let code: string | undefined = error.code;
  let details = detailsOf(error);
  let message = error.message;

  if (isFastifyValidationError(error)) {
    statusCode = 400;
    code = 'VALIDATION_ERROR';
    details = extractValidationDetails(error);
    message = formatValidationMessage(error);
  } else if (isJsonParseError(error)) {
    statusCode = 400;
    code = 'INVALID_JSON';
    message = 'Invalid JSON in request body';
  } else if (isPolicyDocumentError(error)) {
    statusCode = 400;
    code = INVALID_POLICY_DOCUMENT_CODE;
  }

  const response: ApiError = {
    statusCode,
    error: getErrorName(statusCode),
    message
  };

  if (code) {
    response.code = code;
  }

  if (details) {
    response.details = details;
  }

  if (statusCode >= 500) {
    request.log.error({
      err: error,
      method: request.method,
      url: request.url,
      statusCode
    }, 'Internal server error');
  } else if (statusCode >= 400) {
    request.log.warn({
      method: request.method,
      url: request.url,
      statusCode,
      code
    }, error.message);
  }

  reply.status(statusCode).send(response);
}

function getErrorName(statusCode: number): string {
  const names: Record<number, string> = {
    400: 'Bad Request',
    401: 'Unauthorized',
    403: 'Forbidden',
    404: 'Not Found',
    413: 'Payload Too Large',
    415: 'Unsupported Media Type',
    500: 'Internal Server Error',
    503: 'Service Unavailable'
  };
  return names[statusCode] ?? 'Error';
}
