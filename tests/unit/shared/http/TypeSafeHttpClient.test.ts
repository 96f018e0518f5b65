import { AxiosError, AxiosHeaders, CanceledError } from 'axios';
import { z } from 'zod';
import { FetchError } from '../../../../src/shared/errors';
import { TypeSafeHttpClient } from '../../../../src/shared/http/TypeSafeHttpClient';

const TestSchema = z.object({ success: z.boolean() });

function httpError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
    data: {},
    status,
    statusText: 'Error',
    headers: {},
    config,
  });
}

async function captureFailure(promise: Promise<unknown>): Promise<FetchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FetchError) return error;
    throw error;
  }
  throw new Error('Expected the request to fail');
}

describe('TypeSafeHttpClient', () => {
  const transport = { request: jest.fn() };
  let client: TypeSafeHttpClient;

  beforeEach(() => {
    transport.request.mockReset();
    client = new TypeSafeHttpClient(
      { baseURL: 'https://warbeacon.test', timeout: 5000, headers: { 'User-Agent': 'TestAgent/1.0' } },
      transport
    );
  });

  describe('get', () => {
    it('should return validated data', async () => {
      // Arrange
      transport.request.mockResolvedValue({ status: 200, data: { success: true, extra: 1 } });

      // Act
      const result = await client.get('/api/thing', TestSchema);

      // Assert
      expect(result).toEqual({ success: true });
    });

    it('should send a single request with merged headers', async () => {
      transport.request.mockResolvedValue({ status: 200, data: { success: true } });

      await client.get('api/thing', TestSchema, { headers: { Referer: 'https://example.test/br' } });

      expect(transport.request).toHaveBeenCalledTimes(1);
      expect(transport.request).toHaveBeenCalledWith({
        method: 'GET',
        url: '/api/thing',
        baseURL: 'https://warbeacon.test',
        timeout: 5000,
        headers: { 'User-Agent': 'TestAgent/1.0', Referer: 'https://example.test/br' },
        signal: undefined,
      });
    });
  });

  describe('post', () => {
    it('should send the body and pass the abort signal through', async () => {
      transport.request.mockResolvedValue({ status: 200, data: { success: true } });
      const controller = new AbortController();

      await client.post('/api/br/auto', TestSchema, { locations: [] }, { signal: controller.signal });

      expect(transport.request).toHaveBeenCalledWith(
        expect.objectContaining({
          method: 'POST',
          url: '/api/br/auto',
          data: { locations: [] },
          signal: controller.signal,
        })
      );
    });
  });

  describe('failures', () => {
    it('should map a non-2xx response to an http_status FetchError', async () => {
      transport.request.mockRejectedValue(httpError(503));

      const error = await captureFailure(client.get('/api/thing', TestSchema));

      expect(error.reason).toBe('http_status');
      expect(error.responseStatus).toBe(503);
      expect(error.endpoint).toBe('/api/thing');
      expect(error.message).toBe('WarBeacon API returned HTTP 503');
      expect(transport.request).toHaveBeenCalledTimes(1);
    });

    it('should map a timeout to a timeout FetchError', async () => {
      transport.request.mockRejectedValue(new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED'));

      const error = await captureFailure(client.get('/api/thing', TestSchema));

      expect(error.reason).toBe('timeout');
      expect(error.message).toBe('WarBeacon API request timeout (5000ms)');
    });

    it('should map a cancelled request to a cancelled FetchError', async () => {
      transport.request.mockRejectedValue(new CanceledError());

      const error = await captureFailure(client.get('/api/thing', TestSchema));

      expect(error.reason).toBe('cancelled');
    });

    it('should map a connection failure to a network FetchError', async () => {
      transport.request.mockRejectedValue(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));

      const error = await captureFailure(client.get('/api/thing', TestSchema));

      expect(error.reason).toBe('network');
      expect(error.message).toBe('Network error calling WarBeacon API: connect ECONNREFUSED');
    });

    it('should map a non-axios failure to a network FetchError', async () => {
      transport.request.mockRejectedValue(new Error('socket hang up'));

      const error = await captureFailure(client.get('/api/thing', TestSchema));

      expect(error.reason).toBe('network');
      expect(error.cause?.message).toBe('socket hang up');
    });

    it('should reject a response that does not match the schema', async () => {
      transport.request.mockResolvedValue({ status: 200, data: { success: 'yes' } });

      const error = await captureFailure(client.get('/api/thing', TestSchema));

      expect(error.reason).toBe('invalid_response');
      expect(error.message).toBe(
        'Invalid response from WarBeacon API: success: Expected boolean, received string'
      );
    });
  });
});
