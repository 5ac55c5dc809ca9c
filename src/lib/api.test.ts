import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { afterEach, describe, expect, it } from 'vitest';
import { ApiRequestError, apiClient, fetchHealth, removeBackground } from './api';

const originalAdapter = apiClient.defaults.adapter;
const seen: InternalAxiosRequestConfig[] = [];

const respondWith =
  (status: number, data: unknown): AxiosAdapter =>
  async (config) => {
    seen.push(config);
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
    }
    return response;
  };

const jsonBlob = (body: unknown) => new Blob([JSON.stringify(body)], { type: 'application/json' });
const photo = () => new File([new Uint8Array([0x89, 0x50, 0x4e, 0x47])], 'cat.png', { type: 'image/png' });

afterEach(() => {
  apiClient.defaults.adapter = originalAdapter;
  seen.length = 0;
});

describe('removeBackground', () => {
  it('uploads the file as multipart and returns the PNG blob', async () => {
    const png = new Blob([new Uint8Array([1, 2, 3])], { type: 'image/png' });
    apiClient.defaults.adapter = respondWith(200, png);

    const result = await removeBackground(photo());

    expect(result).toBe(png);
    const [config] = seen;
    expect(config.method).toBe('post');
    expect(config.url).toBe('/api/remove-bg');
    expect(config.responseType).toBe('blob');
    const body: unknown = config.data;
    expect(body).toBeInstanceOf(FormData);
    const file = body instanceof FormData ? body.get('file') : null;
    expect(file instanceof File ? file.name : null).toBe('cat.png');
  });

  it('surfaces the rejection reason from a blob error body', async () => {
    apiClient.defaults.adapter = respondWith(
      400,
      jsonBlob({ message: 'File too large. Maximum size: 10.0MB', reason: 'TooLarge' })
    );

    const error = await removeBackground(photo()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiRequestError);
    expect(error).toMatchObject({ message: 'File too large. Maximum size: 10.0MB', status: 400, reason: 'TooLarge' });
  });

  it('passes generic server errors through', async () => {
    apiClient.defaults.adapter = respondWith(500, jsonBlob({ message: 'Failed to process image' }));

    await expect(removeBackground(photo())).rejects.toMatchObject({
      message: 'Failed to process image',
      status: 500,
      reason: undefined
    });
  });

  it('falls back to the status when the body is not JSON', async () => {
    apiClient.defaults.adapter = respondWith(502, new Blob(['<html>Bad gateway</html>'], { type: 'text/html' }));

    await expect(removeBackground(photo())).rejects.toMatchObject({
      message: 'Request failed with status 502',
      status: 502
    });
  });

  it('reports an unreachable service', async () => {
    apiClient.defaults.adapter = async (config) => {
      throw new AxiosError('Network Error', AxiosError.ERR_NETWORK, config);
    };

    await expect(removeBackground(photo())).rejects.toMatchObject({ message: 'Service unreachable' });
  });
});

describe('fetchHealth', () => {
  it('returns the parsed status', async () => {
    apiClient.defaults.adapter = respondWith(200, { status: 'degraded', modelLoaded: false });

    await expect(fetchHealth()).resolves.toEqual({ status: 'degraded', modelLoaded: false });
    expect(seen[0].url).toBe('/health');
  });

  it('rejects an unexpected payload', async () => {
    apiClient.defaults.adapter = respondWith(200, { healthy: true });

    await expect(fetchHealth()).rejects.toBeInstanceOf(ApiRequestError);
  });
});
