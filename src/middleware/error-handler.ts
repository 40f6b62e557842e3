import { MiddlewareObj, Request } from '@middy/core';
import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { ZodError } from 'zod';
import { HTTP_HEADERS, HTTP_STATUS } from '../constants/http';
import { AppError } from '../utils/errors/app-error';
import { ProviderError } from '../utils/errors/provider-error';
import { handleZodError } from './zod-error-handler';

interface ErrorBody {
  status: 'error';
  code: string;
  message: string;
  details?: unknown;
}

const respond = (statusCode: number, body: ErrorBody): APIGatewayProxyResult => ({
  statusCode,
  headers: HTTP_HEADERS,
  body: JSON.stringify(body),
});

/**
 * Maps an error to its HTTP response and logs it as a JSON line
 */
export const toErrorResponse = (error: Error | null | undefined): APIGatewayProxyResult => {
  const timestamp = new Date().toISOString();

  if (error instanceof ZodError) {
    return toErrorResponse(handleZodError(error));
  }

  if (error instanceof AppError) {
    console.warn(
      JSON.stringify({
        level: 'warn',
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        timestamp,
      }),
    );
    return respond(error.statusCode, {
      status: 'error',
      code: error.code,
      message: error.message,
      ...(error.details && { details: error.details }),
    });
  }

  if (error instanceof ProviderError) {
    console.error(
      JSON.stringify({
        level: 'error',
        message: error.message,
        code: 'PROVIDER_ERROR',
        provider: error.provider,
        reason: error.code,
        timestamp,
      }),
    );
    return respond(HTTP_STATUS.SERVICE_UNAVAILABLE, {
      status: 'error',
      code: 'PROVIDER_ERROR',
      message: error.message,
      details: { provider: error.provider, reason: error.code },
    });
  }

  console.error(
    JSON.stringify({
      level: 'error',
      message: 'Unexpected error occurred',
      code: 'INTERNAL_SERVER_ERROR',
      error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined,
      timestamp,
    }),
  );
  return respond(HTTP_STATUS.INTERNAL_SERVER_ERROR, {
    status: 'error',
    code: 'INTERNAL_SERVER_ERROR',
    message: 'An unexpected error occurred',
  });
};

/**
 * Middleware to handle errors in a centralized way
 */
export const errorHandler = (): MiddlewareObj<APIGatewayProxyEvent, APIGatewayProxyResult> => {
  return {
    onError: async (request: Request<APIGatewayProxyEvent, APIGatewayProxyResult>) => {
      const response = toErrorResponse(request.error);
      request.response = response;
      return response;
    },
  };
};
