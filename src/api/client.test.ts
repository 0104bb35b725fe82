import { describe, it, expect, jest } from '@jest/globals';
import type { Audience } from '../auth/audiences.js';
import { createFakeFetch, emptyResponse, jsonResponse } from '../test/fakes.js';
import { ApiClient } from './client.js';
import type { TokenProvider } from './client.js';
import { ApiError } from './errors.js';

const baseUrls = {
  fabric: 'https://fabric.example.test/v1/',
  management: 'https://arm.example.test',
};

function createTokens(initial: string, refreshed: string | null = 'refreshed-token') {
  const getBearerToken = jest.fn(async (_audience?: Audience) => initial);
  const forceRefresh = jest.fn(async (_audience?: Audience) => refreshed);
  const tokens: TokenProvider = { getBearerToken, forceRefresh };
  return { tokens, getBearerToken, forceRefresh };
}

describe('ApiClient', () => {
  describe('buildUrl', () => {
    const client = new ApiClient(createTokens('t').tokens, { baseUrls, fetch: createFakeFetch([]).fetch });

    it('joins the audience base URL and path with one slash', () => {
      expect(client.buildUrl('fabric', '/workspaces')).toBe('https://fabric.example.test/v1/workspaces');
      expect(client.buildUrl('fabric', 'workspaces')).toBe('https://fabric.example.test/v1/workspaces');
    });

    it('appends the query string', () => {
      expect(client.buildUrl('management', '/subscriptions/s/suspend', { 'api-version': '2022-07-01-preview' })).toBe(
        'https://arm.example.test/subscriptions/s/suspend?api-version=2022-07-01-preview'
      );
    });
  });

  it('sends the bearer token of the requested audience', async () => {
    const { tokens, getBearerToken } = createTokens('mgmt-token');
    const { fetch, requests } = createFakeFetch([emptyResponse(202)]);
    const client = new ApiClient(tokens, { baseUrls, fetch });

    const response = await client.post('management', '/x', { query: { 'api-version': '1' } });

    expect(getBearerToken).toHaveBeenCalledWith('management');
    expect(requests).toEqual([
      { url: 'https://arm.example.test/x?api-version=1', method: 'POST', headers: { Authorization: 'Bearer mgmt-token' }, body: undefined },
    ]);
    expect(response.status).toBe(202);
    expect(response.data).toBeUndefined();
  });

  it('encodes a JSON body and parses a JSON response', async () => {
    const { fetch, requests } = createFakeFetch([jsonResponse({ id: 'abc' }, 201)]);
    const client = new ApiClient(createTokens('t').tokens, { baseUrls, fetch });

    const response = await client.post('fabric', '/workspaces', { json: { displayName: 'Sales' } });

    expect(requests[0]?.headers).toEqual({ Authorization: 'Bearer t', 'Content-Type': 'application/json' });
    expect(requests[0]?.body).toBe('{"displayName":"Sales"}');
    expect(response.data).toEqual({ id: 'abc' });
  });

  it('returns a non-JSON body as text', async () => {
    const { fetch } = createFakeFetch([new Response('plain', { status: 200, headers: { 'content-type': 'text/plain' } })]);
    const client = new ApiClient(createTokens('t').tokens, { baseUrls, fetch });

    await expect(client.get('fabric', '/x')).resolves.toMatchObject({ data: 'plain' });
  });

  it('passes form data through untouched', async () => {
    const form = new FormData();
    form.append('file', new Blob(['abc']), 'lib.whl');
    const { fetch, requests } = createFakeFetch([emptyResponse(200)]);
    const client = new ApiClient(createTokens('t').tokens, { baseUrls, fetch });

    await client.post('fabric', '/upload', { form });

    expect(requests[0]?.body).toBe(form);
    expect(requests[0]?.headers).toEqual({ Authorization: 'Bearer t' });
  });

  it('retries a 401 exactly once with a refreshed token', async () => {
    const { tokens, forceRefresh } = createTokens('stale-token');
    const { fetch, requests } = createFakeFetch([emptyResponse(401), jsonResponse({ value: [] })]);
    const client = new ApiClient(tokens, { baseUrls, fetch });

    const response = await client.get('fabric', '/workspaces');

    expect(forceRefresh).toHaveBeenCalledWith('fabric');
    expect(requests.map((r) => r.headers.Authorization)).toEqual(['Bearer stale-token', 'Bearer refreshed-token']);
    expect(response.data).toEqual({ value: [] });
  });

  it('raises Unauthorized when the retry is also rejected', async () => {
    const { tokens, forceRefresh } = createTokens('stale-token');
    const { fetch } = createFakeFetch([emptyResponse(401), new Response('denied', { status: 401 })]);
    const client = new ApiClient(tokens, { baseUrls, fetch });

    const error = await client.get('fabric', '/workspaces').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      kind: 'Unauthorized',
      status: 401,
      body: 'denied',
      message: 'GET https://fabric.example.test/v1/workspaces failed with 401\nResponse: denied',
    });
    expect(forceRefresh).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('does not retry when there is nothing to refresh', async () => {
    const { tokens } = createTokens('manual-token', null);
    const { fetch } = createFakeFetch([emptyResponse(401)]);
    const client = new ApiClient(tokens, { baseUrls, fetch });

    await expect(client.get('fabric', '/workspaces')).rejects.toMatchObject({ kind: 'Unauthorized', status: 401 });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('does not refresh on other client errors', async () => {
    const { tokens, forceRefresh } = createTokens('t');
    const { fetch } = createFakeFetch([jsonResponse({ errorCode: 'InsufficientPrivileges' }, 403)]);
    const client = new ApiClient(tokens, { baseUrls, fetch });

    await expect(client.get('fabric', '/workspaces')).rejects.toMatchObject({ kind: 'ClientError', status: 403 });
    expect(forceRefresh).not.toHaveBeenCalled();
  });

  it('classifies 5xx responses as ServerError', async () => {
    const { fetch } = createFakeFetch([emptyResponse(503)]);
    const client = new ApiClient(createTokens('t').tokens, { baseUrls, fetch });

    await expect(client.get('fabric', '/x')).rejects.toMatchObject({
      kind: 'ServerError',
      status: 503,
      message: 'GET https://fabric.example.test/v1/x failed with 503',
    });
  });

  it('wraps transport failures as NetworkFailure', async () => {
    const { fetch } = createFakeFetch([new TypeError('fetch failed')]);
    const client = new ApiClient(createTokens('t').tokens, { baseUrls, fetch });

    await expect(client.get('fabric', '/x')).rejects.toMatchObject({
      kind: 'NetworkFailure',
      status: undefined,
      message: 'GET https://fabric.example.test/v1/x failed: fetch failed',
    });
  });

  it('propagates an authentication failure without sending anything', async () => {
    const tokens: TokenProvider = {
      getBearerToken: async () => {
        throw new Error('Not logged in');
      },
      forceRefresh: async () => null,
    };
    const { fetch } = createFakeFetch([]);
    const client = new ApiClient(tokens, { baseUrls, fetch });

    await expect(client.get('fabric', '/x')).rejects.toThrow('Not logged in');
    expect(fetch).not.toHaveBeenCalled();
  });
});
