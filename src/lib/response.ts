/**
 * API Response Helpers - Court Alerts Engine
 *
 * Standardized response formats for the read and admin endpoints
 * (API Gateway Lambda proxy shape, served by the engine process).
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { logger } from './logger.js';

/**
 * Standard API error response structure
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

/**
 * Standard API success response structure
 */
export interface SuccessResponse<T = unknown> {
  data: T;
  message?: string;
}

const defaultHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization,X-Api-Key',
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
  'Content-Type': 'application/json',
};

const createResponse = (
  statusCode: number,
  body: unknown,
  additionalHeaders: Record<string, string> = {}
): APIGatewayProxyResult => {
  return {
    statusCode,
    headers: {
      ...defaultHeaders,
      ...additionalHeaders,
    },
    body: JSON.stringify(body),
  };
};

export const successResponse = <T>(data: T, message?: string): APIGatewayProxyResult => {
  const body: SuccessResponse<T> = {
    data,
    ...(message && { message }),
  };

  return createResponse(200, body);
};

export const badRequestResponse = (message: string, details?: unknown): APIGatewayProxyResult => {
  const body: ErrorResponse = {
    error: {
      code: 'BAD_REQUEST',
      message,
      details,
    },
  };

  logger.warn('Bad request', { message, details });
  return createResponse(400, body);
};

export const notFoundResponse = (resource: string = 'Resource'): APIGatewayProxyResult => {
  const body: ErrorResponse = {
    error: {
      code: 'NOT_FOUND',
      message: `${resource} not found`,
    },
  };

  return createResponse(404, body);
};

/**
 * Service unavailable response with 503 status
 */
export const serviceUnavailableResponse = (
  message: string = 'Service unavailable',
  details?: unknown
): APIGatewayProxyResult => {
  const body: ErrorResponse = {
    error: {
      code: 'SERVICE_UNAVAILABLE',
      message,
      details,
    },
  };

  return createResponse(503, body);
};

export const internalServerErrorResponse = (
  message: string = 'An unexpected error occurred'
): APIGatewayProxyResult => {
  const body: ErrorResponse = {
    error: {
      code: 'INTERNAL_SERVER_ERROR',
      message,
    },
  };

  return createResponse(500, body);
};

/**
 * Map an unknown thrown value onto a response. Errors carrying
 * ENGINE_NOT_RUNNING become 503; everything else is logged and becomes 500.
 */
export const handleError = (error: unknown): APIGatewayProxyResult => {
  if (error instanceof Error && Reflect.get(error, 'code') === 'ENGINE_NOT_RUNNING') {
    return serviceUnavailableResponse(error.message);
  }

  logger.error(
    'Unhandled error',
    error instanceof Error ? error : new Error(String(error))
  );
  return internalServerErrorResponse();
};

/**
 * Non-empty path parameter, or undefined
 */
export const getPathParameter = (
  pathParameters: APIGatewayProxyEvent['pathParameters'],
  name: string
): string | undefined => {
  const value = pathParameters?.[name];
  return value && value.length > 0 ? value : undefined;
};
