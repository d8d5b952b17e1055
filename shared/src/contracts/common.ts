import { v4 as uuidv4 } from 'uuid';

/**
 * Common response patterns for all services
 */
export interface ApiError {
  code: ErrorCodes;
  message: string;
  details?: unknown;
  traceId?: string;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  traceId?: string;
  cached?: boolean;
}

/**
 * Common error codes
 */
export enum ErrorCodes {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE'
}

/**
 * Health check response
 */
export interface HealthCheck {
  status: 'healthy' | 'degraded';
  timestamp: string;
  service: string;
  version: string;
  checks: {
    dataset: 'healthy' | 'unhealthy';
    cache: 'healthy' | 'unhealthy' | 'disabled';
  };
  airports: number;
}

export function successResponse<T>(data: T, traceId?: string): ApiResponse<T> {
  return { success: true, data, traceId };
}

export function errorResponse(code: ErrorCodes, message: string, traceId?: string, details?: unknown): ApiResponse<never> {
  const error: ApiError = details === undefined ? { code, message, traceId } : { code, message, details, traceId };
  return { success: false, error, traceId };
}

export function generateTraceId(): string {
  return uuidv4();
}
