import { describe, it, expect } from '@jest/globals';
import { createFakeApi, emptyResponse, jsonResponse } from '../test/fakes.js';
import { normalizeLibraryName, uploadStagingLibrary } from './environments.js';

describe('environments', () => {
  describe('normalizeLibraryName', () => {
    it('drops the version from a wheel name', () => {
      expect(normalizeLibraryName('mylib-1.2.3-py3-none-any.whl')).toBe('mylib-py3-none-any.whl');
    });

    it('leaves a name without a version alone', () => {
      expect(normalizeLibraryName('helpers.jar')).toBe('helpers.jar');
    });
  });

  describe('uploadStagingLibrary', () => {
    const readFile = async () => Buffer.from('wheel-bytes');

    it('uploads to the named environment and publishes it', async () => {
      const { api, requests } = createFakeApi([
        jsonResponse({ value: [{ id: 'env-0', displayName: 'Other' }, { id: 'env-1', displayName: 'Spark' }] }),
        emptyResponse(200),
        emptyResponse(202),
      ]);

      await uploadStagingLibrary(api, 'ws-1', 'Spark', '/tmp/dist/mylib-1.2.3-py3-none-any.whl', { readFile });

      expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual([
        'GET https://fabric.example.test/v1/workspaces/ws-1/environments',
        'POST https://fabric.example.test/v1/workspaces/ws-1/environments/env-1/staging/libraries',
        'POST https://fabric.example.test/v1/workspaces/ws-1/environments/env-1/staging/publish',
      ]);

      const body = requests[1]?.body;
      expect(body).toBeInstanceOf(FormData);
      const file = body instanceof FormData ? body.get('file') : null;
      expect(typeof file).toBe('object');
      if (file && typeof file !== 'string') {
        expect(file.name).toBe('mylib-py3-none-any.whl');
        await expect(file.text()).resolves.toBe('wheel-bytes');
      }
    });

    it('fails for an unknown environment before uploading', async () => {
      const { api, requests } = createFakeApi([jsonResponse({ value: [{ id: 'env-0', displayName: 'Other' }] })]);

      await expect(uploadStagingLibrary(api, 'ws-1', 'Spark', 'lib.whl', { readFile })).rejects.toThrow(
        "Environment with name 'Spark' is not known."
      );
      expect(requests).toHaveLength(1);
    });
  });
});
