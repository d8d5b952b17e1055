import { AxiosError, AxiosHeaders } from 'axios';
import { AmadeusFlightClient, FlightSearchParams, silentLogger } from '@flightfinder/shared';
import { isRetryableError, retryWithBackoff } from '../../shared/src/lib/retry';
import { StubResponse, stubHttp } from '../helpers/fixtures';

const noWait = { baseDelayMs: 0, jitterMs: 0, logger: silentLogger, sleep: async () => undefined };

const params: FlightSearchParams = {
  origin: 'SJC',
  destination: 'DFW',
  departureDate: '2026-03-03',
  adults: 2,
  maxPrice: 400.5
};

const amadeusOffer = {
  id: '1',
  price: { total: '389.20', currency: 'USD', grandTotal: '389.20' },
  validatingAirlineCodes: ['AA'],
  itineraries: [
    {
      duration: 'PT3H35M',
      segments: [
        {
          departure: { iataCode: 'SJC', at: '2026-03-03T08:00:00' },
          arrival: { iataCode: 'DFW', at: '2026-03-03T13:35:00' },
          carrierCode: 'AA',
          number: '100',
          aircraft: { code: '321' }
        }
      ]
    }
  ]
};

function amadeusStub(searchResponses: StubResponse[]) {
  return stubHttp((config) => {
    if (config.url === '/v1/security/oauth2/token') {
      return { status: 200, data: { access_token: 'test-token', expires_in: 1799, token_type: 'Bearer' } };
    }
    return searchResponses.shift() ?? { status: 200, data: { data: [] } };
  });
}

describe('AmadeusFlightClient', () => {
  it('should require credentials before calling out', async () => {
    const { http, requests } = amadeusStub([]);
    const result = await new AmadeusFlightClient({ http, apiKey: 'test-key' }).searchOffers(params);

    expect(!result.ok && result.error.kind).toBe('auth');
    expect(requests).toHaveLength(0);
  });

  it('should fetch a token and search with the mapped parameters', async () => {
    const { http, requests } = amadeusStub([{ status: 200, data: { data: [amadeusOffer] } }]);
    const client = new AmadeusFlightClient({ http, apiKey: 'test-key', apiSecret: 'test-secret', retry: noWait });

    const result = await client.searchOffers(params);

    expect(result).toEqual({
      ok: true,
      value: [
        {
          id: '1',
          price: { total: 389.2, currency: 'USD' },
          validatingAirline: 'AA',
          itineraries: [
            {
              duration: 'PT3H35M',
              stops: 0,
              segments: [
                {
                  departure: { iataCode: 'SJC', at: '2026-03-03T08:00:00' },
                  arrival: { iataCode: 'DFW', at: '2026-03-03T13:35:00' },
                  carrierCode: 'AA',
                  number: '100',
                  aircraft: '321'
                }
              ]
            }
          ]
        }
      ]
    });

    const [tokenRequest, searchRequest] = requests;
    expect(String(tokenRequest.data)).toBe('grant_type=client_credentials&client_id=test-key&client_secret=test-secret');
    expect(searchRequest.url).toBe('/v2/shopping/flight-offers');
    expect(searchRequest.headers.get('Authorization')).toBe('Bearer test-token');
    expect(searchRequest.params).toEqual({
      originLocationCode: 'SJC',
      destinationLocationCode: 'DFW',
      departureDate: '2026-03-03',
      adults: 2,
      travelClass: 'ECONOMY',
      maxPrice: 400,
      currencyCode: 'USD',
      max: 50
    });
  });

  it('should reuse the token until it is about to expire', async () => {
    let now = 1_000_000;
    const { http, requests } = amadeusStub([]);
    const client = new AmadeusFlightClient({ http, apiKey: 'test-key', apiSecret: 'test-secret', now: () => now });

    await client.getAccessToken();
    await client.getAccessToken();
    now += 1_799_000 - 60_000;
    await client.getAccessToken();

    expect(requests.filter((request) => request.url === '/v1/security/oauth2/token')).toHaveLength(2);
  });

  it('should retry server errors and succeed', async () => {
    const { http, requests } = amadeusStub([
      { status: 503, data: {} },
      { status: 200, data: { data: [amadeusOffer] } }
    ]);
    const client = new AmadeusFlightClient({ http, apiKey: 'test-key', apiSecret: 'test-secret', retry: noWait });

    const result = await client.searchOffers(params);

    expect(result.ok).toBe(true);
    expect(requests.filter((request) => request.url === '/v2/shopping/flight-offers')).toHaveLength(2);
  });

  it('should drop the token after an auth failure', async () => {
    const { http, requests } = amadeusStub([{ status: 401, data: {} }]);
    const client = new AmadeusFlightClient({ http, apiKey: 'test-key', apiSecret: 'test-secret', retry: noWait });

    const first = await client.searchOffers(params);
    await client.searchOffers(params);

    expect(first).toEqual({
      ok: false,
      error: { kind: 'auth', message: 'Rejected credentials (HTTP 401)', status: 401 }
    });
    expect(requests.filter((request) => request.url === '/v1/security/oauth2/token')).toHaveLength(2);
  });
});

describe('retryWithBackoff', () => {
  const serverError = () => new AxiosError('Service Unavailable', AxiosError.ERR_BAD_RESPONSE, undefined, null, {
    data: {},
    status: 503,
    statusText: 'Service Unavailable',
    headers: {},
    config: { headers: new AxiosHeaders() }
  });

  it('should give up after the configured number of attempts', async () => {
    const logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
    const operation = jest.fn(async () => {
      throw serverError();
    });

    await expect(retryWithBackoff(operation, { ...noWait, logger })).rejects.toThrow('Service Unavailable');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(logger.info.mock.calls).toEqual([['Retry attempt 1/3 after 0ms'], ['Retry attempt 2/3 after 0ms']]);
  });

  it('should not retry errors that will not change', async () => {
    const operation = jest.fn(async () => {
      throw new Error('bad input');
    });

    await expect(retryWithBackoff(operation, noWait)).rejects.toThrow('bad input');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should classify retryable failures', () => {
    expect(isRetryableError(serverError())).toBe(true);
    expect(isRetryableError(new AxiosError('reset', 'ECONNRESET'))).toBe(true);
    expect(isRetryableError(new AxiosError('aborted', AxiosError.ECONNABORTED))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });
});
