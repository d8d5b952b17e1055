import path from 'path';
import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { AirportTable, loadAirportTable } from '@flightfinder/shared';

export const FIXTURE_CSV = path.join(__dirname, '..', 'fixtures', 'airports.csv');

export function loadFixtureTable(): Promise<AirportTable> {
  return loadAirportTable(FIXTURE_CSV);
}

export interface StubResponse {
  status: number;
  data: unknown;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubResponse | Promise<StubResponse>;

/**
 * Axios instance whose adapter answers in process. Non-2xx answers reject
 * the way axios does, with an AxiosError carrying the response.
 */
export function stubHttp(handler: StubHandler): { http: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const { status, data } = await handler(config);
      const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 200 && status < 300) {
        return response;
      }
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
    }
  });
  return { http, requests };
}

/** Handler that fails like a client-side timeout. */
export const timeoutHandler: StubHandler = (config) => {
  throw new AxiosError('timeout of 10ms exceeded', AxiosError.ECONNABORTED, config);
};
