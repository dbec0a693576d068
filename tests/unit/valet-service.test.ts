import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { pino } from 'pino';
import ValetService, { isSettled } from '../../src/services/valet.service.js';
import RateLimiterService from '../../src/services/rateLimiter.service.js';
import type { RatesCache } from '../../src/services/redis.service.js';
import type { RatesResult } from '../../src/types/index.js';
import {
  InputError,
  ParseError,
  ProtocolError,
  RateLimitError,
  SelectionError,
  TransportError,
} from '../../src/errors.js';
import { dates, observations, valetBody } from '../fixtures/observations.js';

const logger = pino({ level: 'silent' });
const BASE_URL = 'https://valet.test/valet';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('ValetService', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('buildRequestUrl', () => {
    const service = new ValetService(logger, { baseUrl: `${BASE_URL}/` });

    it('requests ten days before the start date without an end date', () => {
      expect(service.buildRequestUrl({ startDate: '2025-01-15', reverse: false })).toBe(
        'https://valet.test/valet/observations/FXUSDCAD/json?start_date=2025-01-05'
      );
    });

    it('requests the reversed series through the end date', () => {
      expect(service.buildRequestUrl({ startDate: '2025-01-18', endDate: '2025-01-21', reverse: true })).toBe(
        'https://valet.test/valet/observations/FXCADUSD/json?start_date=2025-01-08&end_date=2025-01-21'
      );
    });

    it('honours a custom look-back margin', () => {
      const wide = new ValetService(logger, { baseUrl: BASE_URL, lookbackDays: 21 });
      expect(wide.buildRequestUrl({ startDate: '2025-01-03', reverse: false })).toBe(
        'https://valet.test/valet/observations/FXUSDCAD/json?start_date=2024-12-13'
      );
    });
  });

  describe('fetchObservations', () => {
    it('selects the preceding business day for a Saturday', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(valetBody('FXUSDCAD')));
      const service = new ValetService(logger, { baseUrl: BASE_URL });

      const result = await service.fetchObservations({ startDate: '2025-01-18', reverse: false });

      expect(dates(result.observations)).toEqual(['2025-01-17']);
      expect(result.observations[0].rate.toString()).toBe('1.441');
      expect(result.series).toBe('FXUSDCAD');
      expect(result.valetRequestUrl).toBe(
        'https://valet.test/valet/observations/FXUSDCAD/json?start_date=2025-01-08'
      );
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0][0]).toBe(result.valetRequestUrl);
    });

    it('reads the reversed series key for a range', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(valetBody('FXCADUSD', '2025-01-21')));
      const service = new ValetService(logger, { baseUrl: BASE_URL });

      const result = await service.fetchObservations({
        startDate: '2025-01-18',
        endDate: '2025-01-21',
        reverse: true,
      });

      expect(result.series).toBe('FXCADUSD');
      expect(dates(result.observations)).toEqual(['2025-01-17', '2025-01-20', '2025-01-21']);
    });

    it('rejects an inverted range before any request', async () => {
      const service = new ValetService(logger, { baseUrl: BASE_URL });

      await expect(
        service.fetchObservations({ startDate: '2025-01-21', endDate: '2025-01-15', reverse: false })
      ).rejects.toBeInstanceOf(InputError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('wraps network failures as transport errors', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
      const service = new ValetService(logger, { baseUrl: BASE_URL });

      const error = await service.fetchObservations({ startDate: '2025-01-15', reverse: false }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect((error as TransportError).message).toBe('failure while accessing Valet: fetch failed');
    });

    it('reports a timeout while the body downloads as a transport error', async () => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.error(new DOMException('The operation was aborted due to timeout', 'TimeoutError'));
        },
      });
      fetchMock.mockResolvedValueOnce(new Response(body, { status: 200 }));
      const service = new ValetService(logger, { baseUrl: BASE_URL });

      const error = await service.fetchObservations({ startDate: '2025-01-15', reverse: false }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect((error as TransportError).message).toBe('failure while accessing Valet: request timed out');
      expect((error as TransportError).requestUrl).toBe(
        'https://valet.test/valet/observations/FXUSDCAD/json?start_date=2025-01-05'
      );
    });

    it('pretty-prints a JSON error payload', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ message: 'Series not found' }, 404));
      const service = new ValetService(logger, { baseUrl: BASE_URL });

      const error = await service.fetchObservations({ startDate: '2025-01-15', reverse: false }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProtocolError);
      expect((error as ProtocolError).status).toBe(404);
      expect((error as ProtocolError).payload).toBe('{\n  "message": "Series not found"\n}');
      expect((error as ProtocolError).message).toBe('Valet responded with HTTP 404');
    });

    it('keeps a non-JSON error body as received', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>Service Unavailable</html>', { status: 503 }));
      const service = new ValetService(logger, { baseUrl: BASE_URL });

      const error = await service.fetchObservations({ startDate: '2025-01-15', reverse: false }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProtocolError);
      expect((error as ProtocolError).payload).toBe('<html>Service Unavailable</html>');
    });

    it('reports a body missing the series value as a parse error', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ observations: [{ d: '2025-01-15', FXEURCAD: { v: '1.49' } }] }));
      const service = new ValetService(logger, { baseUrl: BASE_URL });

      await expect(service.fetchObservations({ startDate: '2025-01-15', reverse: false })).rejects.toThrow(
        new ParseError('failed to parse exchange data: observations.0.FXUSDCAD: Required')
      );
    });

    it('reports a non-JSON success body as a parse error', async () => {
      fetchMock.mockResolvedValueOnce(new Response('not json', { status: 200 }));
      const service = new ValetService(logger, { baseUrl: BASE_URL });

      await expect(service.fetchObservations({ startDate: '2025-01-15', reverse: false })).rejects.toBeInstanceOf(
        ParseError
      );
    });

    it('fails selection when the window is empty', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ observations: [] }));
      const service = new ValetService(logger, { baseUrl: BASE_URL });

      await expect(service.fetchObservations({ startDate: '2025-01-15', reverse: false })).rejects.toBeInstanceOf(
        SelectionError
      );
    });

    it('serves a cached result without calling Valet', async () => {
      const cached: RatesResult = {
        series: 'FXUSDCAD',
        startDate: '2025-01-15',
        observations: observations('2025-01-15').slice(-1),
        valetRequestUrl: `${BASE_URL}/observations/FXUSDCAD/json?start_date=2025-01-05`,
        cached: true,
      };
      const cache: RatesCache = {
        getCacheKey: (series, start, end) => `${series}:${start}:${end ?? 'latest'}`,
        getRates: vi.fn(async () => cached),
        setRates: vi.fn(async () => {}),
      };
      const service = new ValetService(logger, { baseUrl: BASE_URL, cache });

      const result = await service.fetchObservations({ startDate: '2025-01-15', reverse: false });

      expect(result).toBe(cached);
      expect(cache.getRates).toHaveBeenCalledWith('FXUSDCAD:2025-01-15:latest');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('stores a fresh result in the cache', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(valetBody('FXUSDCAD', '2025-01-17')));
      const setRates = vi.fn(async () => {});
      const cache: RatesCache = {
        getCacheKey: (series, start, end) => `${series}:${start}:${end ?? 'latest'}`,
        getRates: async () => null,
        setRates,
      };
      const service = new ValetService(logger, { baseUrl: BASE_URL, cache });

      const result = await service.fetchObservations({ startDate: '2025-01-15', endDate: '2025-01-17', reverse: false });

      expect(setRates).toHaveBeenCalledWith('FXUSDCAD:2025-01-15:2025-01-17', result);
    });

    it('does not cache an answer that fell back from an unpublished day', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(valetBody('FXUSDCAD', '2025-01-17')));
      const setRates = vi.fn(async () => {});
      const cache: RatesCache = {
        getCacheKey: (series, start, end) => `${series}:${start}:${end ?? 'latest'}`,
        getRates: async () => null,
        setRates,
      };
      const service = new ValetService(logger, { baseUrl: BASE_URL, cache });

      const result = await service.fetchObservations({ startDate: '2025-01-18', reverse: false });

      expect(dates(result.observations)).toEqual(['2025-01-17']);
      expect(setRates).not.toHaveBeenCalled();
    });

    it('refuses to call Valet once the local limit is reached', async () => {
      fetchMock.mockImplementation(async () => jsonResponse(valetBody('FXUSDCAD')));
      const rateLimiter = new RateLimiterService(logger, { maxPerMinute: 1, now: () => 1_000 });
      const service = new ValetService(logger, { baseUrl: BASE_URL, rateLimiter });

      await service.fetchObservations({ startDate: '2025-01-15', reverse: false });
      await expect(service.fetchObservations({ startDate: '2025-01-16', reverse: false })).rejects.toBeInstanceOf(
        RateLimitError
      );
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });
});

describe('isSettled', () => {
  const base = {
    series: 'FXUSDCAD' as const,
    valetRequestUrl: `${BASE_URL}/observations/FXUSDCAD/json?start_date=2025-01-08`,
  };

  it('holds when the last row is the requested day', () => {
    expect(isSettled({ ...base, startDate: '2025-01-17', observations: observations('2025-01-17').slice(-1) })).toBe(true);
    expect(
      isSettled({ ...base, startDate: '2025-01-15', endDate: '2025-01-17', observations: observations('2025-01-17').slice(-3) })
    ).toBe(true);
  });

  it('fails when the requested right edge has no row yet', () => {
    expect(isSettled({ ...base, startDate: '2025-01-18', observations: observations('2025-01-17').slice(-1) })).toBe(false);
    expect(
      isSettled({ ...base, startDate: '2025-01-15', endDate: '2025-01-23', observations: observations('2025-01-22').slice(-6) })
    ).toBe(false);
    expect(isSettled({ ...base, startDate: '2025-01-15', observations: [] })).toBe(false);
  });
});
