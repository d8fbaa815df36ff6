import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'node:crypto';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { setLogSink } from '@stacksmith/shared';
import { buildGraph } from '@stacksmith/engine';
import { loadConfig } from '../config-loader.js';
import { interpolateEnv, loadStack } from '../stack-loader.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'stacksmith-cli-'));
  setLogSink(() => undefined);
});

afterEach(async () => {
  setLogSink();
  await rm(dir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('reads the file and applies environment overrides', async () => {
    const path = join(dir, 'stacksmith.json');
    await writeFile(
      path,
      JSON.stringify({
        stacksmith: { stackFile: 'infra/stack.json', stateBackend: 'sqlite' },
        apply: { parallelism: 2 },
      })
    );

    const config = loadConfig(path, {
      STACKSMITH_PARALLELISM: '8',
      STACKSMITH_FAIL_FAST: '1',
      STACKSMITH_LOG_LEVEL: 'debug',
    });

    expect(config.stacksmith.stackFile).toBe('infra/stack.json');
    expect(config.stacksmith.stateBackend).toBe('sqlite');
    expect(config.apply.parallelism).toBe(8);
    expect(config.apply.failFast).toBe(true);
    expect(config.apply.maxAttempts).toBe(3);
    expect(config.logging.level).toBe('debug');
  });

  it('fails when an explicit config file is missing', () => {
    const path = join(dir, 'missing.json');

    expect(() => loadConfig(path, {})).toThrow(`Config file not found: ${path}`);
  });

  it('rejects an invalid state backend', async () => {
    const path = join(dir, 'stacksmith.json');
    await writeFile(path, JSON.stringify({ stacksmith: { stateBackend: 's3' } }));

    expect(() => loadConfig(path, {})).toThrow();
  });
});

describe('interpolateEnv', () => {
  it('substitutes placeholders anywhere in a value', () => {
    const attributes = interpolateEnv(
      'fn',
      {
        environment: { API_KEY: '${env:WEATHER_API_KEY}', HOST: 'https://${env:WEATHER_HOST}/v1' },
        uri: { $ref: 'api', attr: 'id' },
      },
      { WEATHER_API_KEY: 'test-secret', WEATHER_HOST: 'weather.example.com' }
    );

    expect(attributes).toEqual({
      environment: { API_KEY: 'test-secret', HOST: 'https://weather.example.com/v1' },
      uri: { $ref: 'api', attr: 'id' },
    });
  });

  it('names the field that needs a missing variable', () => {
    expect(() => interpolateEnv('fn', { environment: { API_KEY: '${env:WEATHER_API_KEY}' } }, {})).toThrow(
      'Environment variable WEATHER_API_KEY is not set (used by fn.environment)'
    );
  });
});

describe('loadStack', () => {
  it('hashes artifacts and renders cors declarations', async () => {
    await writeFile(join(dir, 'weather.zip'), 'function bundle');
    const stackPath = join(dir, 'stack.json');
    await writeFile(
      stackPath,
      JSON.stringify({
        name: 'weather',
        resources: [
          {
            id: 'fn',
            kind: 'Function',
            artifact: 'weather.zip',
            attributes: { functionName: 'weather', environment: { TABLE: '${env:TABLE_NAME}' } },
          },
          { id: 'api', kind: 'ApiGateway' },
          { id: 'route', kind: 'Route', attributes: { restApiId: { $ref: 'api', attr: 'id' } } },
        ],
        cors: [
          {
            id: 'cors',
            restApi: 'api',
            resource: 'route',
            allowedHeaders: ['Content-Type'],
            allowedMethods: ['GET', 'OPTIONS'],
            allowedOrigins: ['*'],
          },
        ],
      })
    );

    const stack = await loadStack(stackPath, { TABLE_NAME: 'weather-data' });

    expect(stack.name).toBe('weather');
    expect(stack.nodes.map((n) => n.id)).toEqual([
      'fn',
      'api',
      'route',
      'cors-method',
      'cors-integration',
      'cors-method-response',
      'cors-integration-response',
    ]);
    expect(stack.nodes[0]?.attributes).toEqual({
      functionName: 'weather',
      environment: { TABLE: 'weather-data' },
      codeHash: createHash('sha256').update('function bundle').digest('hex'),
    });
  });

  it('rejects a stack that fails validation', async () => {
    const stackPath = join(dir, 'stack.json');
    await writeFile(stackPath, JSON.stringify({ name: 'weather', resources: [{ id: 'x', kind: 'Queue' }] }));

    await expect(loadStack(stackPath, {})).rejects.toThrow();
  });

  it('loads the bundled weather example', async () => {
    const stackPath = fileURLToPath(new URL('../../../../examples/weather-stack/stack.json', import.meta.url));

    const stack = await loadStack(stackPath, {
      WEATHER_API_KEY: 'test-secret',
      WEATHER_API_HOST: 'weather.example.com',
    });
    const order = buildGraph(stack.nodes).order;

    expect(stack.nodes).toHaveLength(18);
    expect(stack.nodes.find((n) => n.id === 'weather-fn')?.attributes.environment).toMatchObject({
      WEATHER_API_KEY: 'test-secret',
      WEATHER_API_URL: 'https://weather.example.com/v1/current',
    });
    expect(order.indexOf('deployment')).toBeGreaterThan(order.indexOf('weather-cors-integration-response'));
    expect(order.indexOf('prod')).toBeGreaterThan(order.indexOf('deployment'));
  });
});
