import { describe, test, expect } from 'vitest';
import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { EllieClient, extractModelId, normalizeOrganization } from './ellieClient';
import type { EllieModelPayload } from './ellieFormat';
import { EllieApiError } from './errors';

interface StubReply {
  status: number;
  data: unknown;
}

function stubAdapter(reply: (config: InternalAxiosRequestConfig) => StubReply) {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const { status, data } = reply(config);
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, undefined, response);
    }
    return response;
  };
  return { adapter, calls };
}

const settings = { organization: 'acme.ellie.ai/', token: 'test-secret' };

const payload: EllieModelPayload = {
  model: { name: 'Sales', level: 'physical', folderId: 42, entities: [], relationships: [] },
};

describe('EllieClient', () => {
  test('posts new models with the token as query parameter', async () => {
    const { adapter, calls } = stubAdapter(() => ({ status: 200, data: { id: 123 } }));
    const client = new EllieClient(settings, { adapter });

    const modelId = await client.createModel(payload);

    expect(modelId).toBe('123');
    expect(calls).toHaveLength(1);
    expect(calls[0].method).toBe('post');
    expect(calls[0].baseURL).toBe('https://acme.ellie.ai/api/v1');
    expect(calls[0].url).toBe('/models');
    expect(calls[0].params).toEqual({ token: 'test-secret' });
    expect(JSON.parse(String(calls[0].data))).toEqual(payload);
  });

  test('exports and updates models by id', async () => {
    const exported = { model: { entities: [], relationships: [] } };
    const { adapter, calls } = stubAdapter(config => ({ status: 200, data: config.method === 'get' ? exported : {} }));
    const client = new EllieClient({ ...settings, apiVersion: 'v2' }, { adapter });

    expect(await client.exportModel('9')).toEqual(exported);
    await client.updateModel('9', payload);

    expect(calls.map(c => `${c.method} ${c.baseURL}${c.url}`)).toEqual([
      'get https://acme.ellie.ai/api/v2/models/9',
      'put https://acme.ellie.ai/api/v2/models/9',
    ]);
  });

  test('turns error responses into EllieApiError', async () => {
    const { adapter } = stubAdapter(() => ({ status: 401, data: { error: 'invalid token' } }));
    const client = new EllieClient(settings, { adapter });

    const error = await client.exportModel('9').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EllieApiError);
    expect(error).toMatchObject({
      message: 'Ellie request GET /models/9 failed with status 401',
      status: 401,
      body: '{"error":"invalid token"}',
    });
  });

  test('reports requests that got no response', async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError('timeout of 60000ms exceeded', AxiosError.ECONNABORTED, config);
    };
    const client = new EllieClient(settings, { adapter });

    await expect(client.createModel(payload)).rejects.toThrow(
      new EllieApiError('Ellie request POST /models failed: timeout of 60000ms exceeded', undefined, '')
    );
  });

  test('links to the created model, or searches by name', () => {
    const client = new EllieClient(settings);

    expect(client.modelUrl('physical', '123', 'Sales')).toBe('https://acme.ellie.ai/models/physical/123');
    expect(client.modelUrl('logical', undefined, 'Sales Model')).toBe('https://acme.ellie.ai/models?search=Sales%20Model');
  });
});

describe('extractModelId', () => {
  test('reads id or modelId', () => {
    expect(extractModelId({ id: 'abc' })).toBe('abc');
    expect(extractModelId({ modelId: 5 })).toBe('5');
    expect(extractModelId({ status: 'ok' })).toBeUndefined();
    expect(extractModelId('created')).toBeUndefined();
  });
});

describe('normalizeOrganization', () => {
  test('adds a scheme and drops trailing slashes', () => {
    expect(normalizeOrganization('acme.ellie.ai')).toBe('https://acme.ellie.ai');
    expect(normalizeOrganization(' http://localhost:8080// ')).toBe('http://localhost:8080');
  });
});
