import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ServerConfig } from './config.js';
import { createMcpServer, greet } from './mcp-server.js';
import { startEstimatorStub, unreachableBaseUrl } from './testing/estimator-stub.js';
import type { EstimatorStub } from './testing/estimator-stub.js';

async function connect(config: ServerConfig): Promise<Client> {
  const server = createMcpServer(config);
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  return client;
}

function textOf(result: unknown): { text: string; isError: boolean } {
  const parsed = CallToolResultSchema.parse(result);
  const first = parsed.content[0];
  if (!first || first.type !== 'text') throw new Error('Expected a text content item');
  return { text: first.text, isError: parsed.isError ?? false };
}

describe('greet', () => {
  it('formats the greeting exactly', () => {
    expect(greet('World')).toBe('Hello, World!');
    expect(greet('')).toBe('Hello, !');
  });
});

describe('createMcpServer', () => {
  let stub: EstimatorStub;
  let client: Client;

  beforeAll(async () => {
    stub = await startEstimatorStub();
  });

  afterAll(async () => {
    await stub.close();
  });

  beforeEach(async () => {
    stub.requests.length = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    client = await connect({
      port: 8000,
      estimatorBaseUrl: stub.baseUrl,
      estimatorTimeoutMs: 30_000,
      env: 'test',
    });
  });

  afterEach(async () => {
    await client.close();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('lists both tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(['estimate_real_estate_investment', 'greet']);
  });

  it('greets through the tool surface', async () => {
    const result = await client.callTool({ name: 'greet', arguments: { name: 'World' } });
    expect(textOf(result)).toEqual({ text: 'Hello, World!', isError: false });
  });

  it('returns the estimation JSON unmodified', async () => {
    stub.respondWith((_req, res) => {
      res.json({ tri: 0.07, noi: 4200 });
    });

    const result = textOf(await client.callTool({ name: 'estimate_real_estate_investment', arguments: {} }));

    expect(result.isError).toBe(false);
    expect(JSON.parse(result.text)).toEqual({ tri: 0.07, noi: 4200 });
    expect(stub.requests[0].body).toMatchObject({ purchasePrice: 50000, notaryRate: 0.08 });
    expect(stub.requests[0].body).not.toHaveProperty('resaleYears');
  });

  it('forwards overrides and resale parameters', async () => {
    await client.callTool({
      name: 'estimate_real_estate_investment',
      arguments: { purchase_price: 90000, rent: 700, resale_years: 10, resale_price: 80000.0 },
    });

    expect(stub.requests[0].body).toMatchObject({
      purchasePrice: 90000,
      rent: 700,
      resaleYears: 10,
      resalePrice: 80000,
    });
  });

  it('reads credentials from the environment on every call', async () => {
    vi.stubEnv('API_USERNAME', '');
    vi.stubEnv('API_PASSWORD', '');
    await client.callTool({ name: 'estimate_real_estate_investment', arguments: {} });

    vi.stubEnv('API_USERNAME', 'alice');
    vi.stubEnv('API_PASSWORD', 'secret');
    await client.callTool({ name: 'estimate_real_estate_investment', arguments: {} });

    expect(stub.requests[0].headers.authorization).toBeUndefined();
    expect(stub.requests[1].headers.authorization).toBe('Basic YWxpY2U6c2VjcmV0');
  });

  it('honours a per-call api_base_url', async () => {
    const other = await startEstimatorStub();
    other.respondWith((_req, res) => {
      res.json({ source: 'other' });
    });

    try {
      const result = textOf(
        await client.callTool({
          name: 'estimate_real_estate_investment',
          arguments: { api_base_url: other.baseUrl },
        }),
      );
      expect(JSON.parse(result.text)).toEqual({ source: 'other' });
      expect(other.requests).toHaveLength(1);
      expect(stub.requests).toHaveLength(0);
    } finally {
      await other.close();
    }
  });

  it('returns the error dictionary as a normal result for a 500', async () => {
    stub.respondWith((_req, res) => {
      res.sendStatus(500);
    });

    const result = textOf(await client.callTool({ name: 'estimate_real_estate_investment', arguments: {} }));

    expect(result.isError).toBe(false);
    const body: unknown = JSON.parse(result.text);
    expect(body).toMatchObject({ status_code: 500 });
    expect(body).toHaveProperty('error', expect.stringContaining('HTTP error occurred'));
  });

  it('returns a null status code when the service is unreachable', async () => {
    const result = textOf(
      await client.callTool({
        name: 'estimate_real_estate_investment',
        arguments: { api_base_url: await unreachableBaseUrl() },
      }),
    );

    expect(result.isError).toBe(false);
    expect(JSON.parse(result.text)).toMatchObject({ status_code: null });
  });

  it('returns the error dictionary for a base URL without a scheme', async () => {
    const result = textOf(
      await client.callTool({
        name: 'estimate_real_estate_investment',
        arguments: { api_base_url: 'estimation.local' },
      }),
    );

    expect(result.isError).toBe(false);
    expect(JSON.parse(result.text)).toEqual({
      error: "HTTP error occurred: Request URL is missing an 'http://' or 'https://' protocol: 'estimation.local/api/estimate'",
      status_code: null,
    });
    expect(stub.requests).toHaveLength(0);
  });

  it('serves the instructions resource', async () => {
    const { contents } = await client.readResource({ uri: 'estimator://instructions' });
    const first = contents[0];
    expect(first.uri).toBe('estimator://instructions');
    expect('text' in first && first.text).toContain('## Defaults');
  });

  it('builds the analyze_investment prompt from the given values', async () => {
    const { messages } = await client.getPrompt({
      name: 'analyze_investment',
      arguments: { purchase_price: '120000' },
    });
    const content = messages[0].content;
    expect(content.type).toBe('text');
    if (content.type === 'text') {
      expect(content.text).toContain('Call `estimate_real_estate_investment` with purchase_price=120000.');
    }
  });
});
