import { describe, it, expect } from '@jest/globals';
import { createFakeApi, emptyResponse, jsonResponse } from '../test/fakes.js';
import { assignWorkspaceToCapacity, createWorkspace, listWorkspaces, provisionWorkspaceIdentity } from './workspaces.js';

describe('workspaces', () => {
  describe('createWorkspace', () => {
    it('returns the id from the response body', async () => {
      const { api, requests } = createFakeApi([jsonResponse({ id: 'ws-1', displayName: 'Sales' }, 201)]);

      await expect(createWorkspace(api, 'Sales')).resolves.toBe('ws-1');
      expect(requests[0]).toMatchObject({
        url: 'https://fabric.example.test/v1/workspaces',
        method: 'POST',
        body: '{"displayName":"Sales"}',
      });
    });

    it('sends the capacity id when given', async () => {
      const { api, requests } = createFakeApi([jsonResponse({ id: 'ws-1' }, 201)]);

      await createWorkspace(api, 'Sales', 'cap-1');
      expect(requests[0]?.body).toBe('{"displayName":"Sales","capacityId":"cap-1"}');
    });

    it('falls back to the Location header', async () => {
      const { api } = createFakeApi([
        emptyResponse(202, { location: 'https://fabric.example.test/v1/workspaces/ws-2' }),
      ]);

      await expect(createWorkspace(api, 'Sales')).resolves.toBe('ws-2');
    });

    it('fails when neither an id nor a Location is returned', async () => {
      const { api } = createFakeApi([emptyResponse(202)]);

      await expect(createWorkspace(api, 'Sales')).rejects.toThrow(
        "Workspace 'Sales' was created but the response carried neither an id nor a Location header"
      );
    });
  });

  it('lists workspaces, skipping incomplete entries', async () => {
    const { api, requests } = createFakeApi([
      jsonResponse({
        value: [
          { id: 'ws-1', displayName: 'Sales', capacityId: 'cap-1' },
          { id: 'ws-2', displayName: 'Finance', capacityId: null },
          { id: 'ws-3' },
        ],
      }),
    ]);

    await expect(listWorkspaces(api)).resolves.toEqual([
      { id: 'ws-1', displayName: 'Sales', capacityId: 'cap-1' },
      { id: 'ws-2', displayName: 'Finance', capacityId: undefined },
    ]);
    expect(requests[0]).toMatchObject({ url: 'https://fabric.example.test/v1/workspaces', method: 'GET' });
  });

  it('lists nothing when the response has no value', async () => {
    const { api } = createFakeApi([jsonResponse({})]);
    await expect(listWorkspaces(api)).resolves.toEqual([]);
  });

  it('provisions a workspace identity', async () => {
    const { api, requests } = createFakeApi([emptyResponse(202)]);

    await provisionWorkspaceIdentity(api, 'ws-1');
    expect(requests[0]).toMatchObject({ url: 'https://fabric.example.test/v1/workspaces/ws-1/provisionIdentity', method: 'POST' });
  });

  it('assigns a workspace to a capacity', async () => {
    const { api, requests } = createFakeApi([emptyResponse(202)]);

    await assignWorkspaceToCapacity(api, 'ws-1', 'cap-1');
    expect(requests[0]).toMatchObject({
      url: 'https://fabric.example.test/v1/workspaces/ws-1/assignToCapacity',
      body: '{"capacityId":"cap-1"}',
    });
  });
});
