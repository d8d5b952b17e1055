import axios from 'axios';
import { ZodError } from 'zod';

export type ServiceErrorKind =
  | 'auth'
  | 'not_found'
  | 'rate_limited'
  | 'timeout'
  | 'network'
  | 'server_error'
  | 'invalid_response';

export interface ServiceFailure {
  kind: ServiceErrorKind;
  message: string;
  status?: number;
}

/** Tagged result of one call to an external service. */
export type ServiceResult<T> = { ok: true; value: T } | Failed;

type Failed = { ok: false; error: ServiceFailure };

export const ok = <T>(value: T): ServiceResult<T> => ({ ok: true, value });

export const fail = (kind: ServiceErrorKind, message: string, status?: number): Failed => ({
  ok: false,
  error: status === undefined ? { kind, message } : { kind, message, status }
});

/** Map anything thrown by axios or a response schema to a ServiceFailure. */
export function classifyError(error: unknown): ServiceFailure {
  if (error instanceof ZodError) {
    return { kind: 'invalid_response', message: `Unexpected response shape: ${error.issues[0]?.message ?? 'invalid'}` };
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      if (status === 401 || status === 403) return { kind: 'auth', message: `Rejected credentials (HTTP ${status})`, status };
      if (status === 404) return { kind: 'not_found', message: 'Resource not found (HTTP 404)', status };
      if (status === 429) return { kind: 'rate_limited', message: 'Rate limit exceeded (HTTP 429)', status };
      if (status >= 500) return { kind: 'server_error', message: `Service error (HTTP ${status})`, status };
      return { kind: 'invalid_response', message: `Unexpected HTTP ${status}`, status };
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return { kind: 'timeout', message: error.message };
    }
    return { kind: 'network', message: error.message };
  }

  return { kind: 'network', message: error instanceof Error ? error.message : String(error) };
}
