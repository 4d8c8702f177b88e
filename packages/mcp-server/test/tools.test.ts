import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createServer } from '../src/server.js';
import * as registry from '../src/registry.js';
import type { ServerConfig } from '../src/config.js';

const TEST_CONFIG: ServerConfig = { defaultTolerance: 1e-6, checkContracts: true, maxCertifyLevel: 12 };

const ToolResult = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
  isError: z.boolean().optional(),
});

let client: Client;
let closeAll: () => Promise<void>;

async function connect(config: ServerConfig): Promise<void> {
  const server = createServer(config);
  client = new Client({ name: 'test-client', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  closeAll = async () => {
    await client.close();
    await server.close();
  };
}

async function call(name: string, args: Record<string, unknown> = {}): Promise<{ isError: boolean; text: string }> {
  const result = ToolResult.parse(await client.callTool({ name, arguments: args }));
  return { isError: result.isError ?? false, text: result.content.map((c) => c.text).join('\n') };
}

/** Call a tool that must succeed and parse its JSON body. */
async function ok(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  const { isError, text } = await call(name, args);
  expect(isError, text).toBe(false);
  return JSON.parse(text);
}

const RAYS = { s: [[null, -1]], t: [[1, null]] };

beforeEach(async () => {
  registry.clear();
  await connect(TEST_CONFIG);
});

afterEach(async () => {
  await closeAll();
});

describe('tool listing', () => {
  it('registers every tool', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      'approximate',
      'certify_continuity',
      'create_box_region',
      'create_halfspace_region',
      'create_interval_separator',
      'create_region_separator',
      'create_sphere_region',
      'delete_separator',
      'evaluate',
      'list_regions',
      'list_separators',
      'sample',
      'translate_region',
      'union_regions',
    ]);
  });
});

describe('interval separators', () => {
  it('creates with a readback', async () => {
    expect(await ok('create_interval_separator', RAYS)).toEqual({
      separator_id: 'sep_1',
      kind: 'interval',
      readback: { space: 'real line', s: '(-∞, -1]', t: '[1, ∞)', range: [0, 1], tolerance: 1e-6 },
    });
  });

  it('evaluates with an error bound', async () => {
    await ok('create_interval_separator', RAYS);
    expect(await ok('evaluate', { separator: 'sep_1', point: 0 })).toEqual({
      separator: 'sep_1',
      point: 0,
      value: 0.5,
      unit_value: 0.5,
      depth: 20,
      error_bound: 0,
      exact: true,
    });
  });

  it('rescales to a range', async () => {
    await ok('create_interval_separator', { ...RAYS, range: [10, 20], name: 'heat' });
    expect(await ok('evaluate', { separator: 'heat', point: 0 })).toMatchObject({ value: 15, unit_value: 0.5 });
    expect(await ok('sample', { separator: 'heat', points: [-1, 0, 1] })).toEqual({
      separator: 'heat',
      count: 3,
      values: [10, 15, 20],
    });
  });

  it('approximates at a fixed depth', async () => {
    await ok('create_interval_separator', RAYS);
    expect(await ok('approximate', { separator: 'sep_1', point: 0, depth: 0 })).toMatchObject({ value: 0 });
    expect(await ok('approximate', { separator: 'sep_1', point: 0, depth: 1 })).toMatchObject({ value: 0.5 });
  });

  it('certifies continuity', async () => {
    // s = {0}, t = complement of (-1, 1)
    await ok('create_interval_separator', { s: [[0, 0]], t: [[null, -1], [1, null]] });
    const whole = await ok('certify_continuity', { separator: 'sep_1', point: 0.7, level: 0 });
    expect(whole).toMatchObject({ bound: 1, radius: null, neighborhood: '(-∞, ∞)' });

    const cert = z.object({
      bound: z.number(),
      radius: z.number(),
      neighborhood: z.string(),
      inside_left: z.number(),
      outside_left: z.number(),
    }).parse(await ok('certify_continuity', { separator: 'sep_1', point: 0.7, level: 1 }));
    expect(cert.neighborhood).toBe('(-∞, -0.25) ∪ (0.25, ∞)');
    expect(cert.bound).toBe(0.75);
    expect(cert.radius).toBeCloseTo(0.45, 12);
    expect(cert.inside_left).toBe(0);
    expect(cert.outside_left).toBe(1);
  });

  it('caps the certificate level', async () => {
    await ok('create_interval_separator', RAYS);
    const { isError, text } = await call('certify_continuity', { separator: 'sep_1', point: 0, level: 13 });
    expect(isError).toBe(true);
    expect(text).toContain('exceeds the server limit of 12');
  });
});

describe('region separators', () => {
  it('builds regions and reads them back', async () => {
    expect(await ok('create_sphere_region', { radius: 1, name: 'a' })).toEqual({
      region_id: 'a',
      type: 'sphere',
      readback: { field: 'sphere(r=1)', lipschitz: 1 },
    });
    await ok('create_sphere_region', { radius: 1 });
    expect(await ok('translate_region', { region: 'region_1', x: 4, y: 0, z: 0 })).toMatchObject({
      region_id: 'region_2',
      readback: { field: 'sphere(r=1)@(4, 0, 0)' },
    });
    expect(await ok('union_regions', { region_a: 'a', region_b: 'region_2' })).toMatchObject({
      region_id: 'region_3',
      readback: { field: 'union(sphere(r=1), sphere(r=1)@(4, 0, 0))', lipschitz: 1 },
    });
    expect(await ok('list_regions')).toMatchObject({ count: 4 });
  });

  it('is exactly 1/2 between two unit spheres', async () => {
    await ok('create_sphere_region', { radius: 1, name: 'a' });
    await ok('create_sphere_region', { radius: 1, name: 'b0' });
    await ok('translate_region', { region: 'b0', x: 4, y: 0, z: 0, name: 'b' });
    expect(await ok('create_region_separator', { s: 'a', t: 'b' })).toEqual({
      separator_id: 'sep_1',
      kind: 'region',
      readback: {
        space: 'R^3 (level sets)',
        s: '{sphere(r=1) ≤ 0}',
        t: '{sphere(r=1)@(4, 0, 0) ≤ 0}',
        range: [0, 1],
        tolerance: 1e-6,
      },
    });
    expect(await ok('evaluate', { separator: 'sep_1', point: [2, 5, -3] })).toMatchObject({ value: 0.5, exact: true });

    const cert = await ok('certify_continuity', { separator: 'sep_1', point: [1.8, 0.1, 0], level: 2 });
    const parsed = z.object({ radius: z.number(), bound: z.number() }).parse(cert);
    expect(parsed.radius).toBeGreaterThan(0);
    expect(parsed.bound).toBe(0.5625);
    expect(cert).not.toHaveProperty('neighborhood');
  });

  it('builds from half-spaces and boxes', async () => {
    await ok('create_halfspace_region', { normal_x: 1, normal_y: 0, normal_z: 0, offset: -1, name: 'left' });
    await ok('create_box_region', { width: 2, height: 2, depth: 2, name: 'cube0' });
    await ok('translate_region', { region: 'cube0', x: 3, y: 0, z: 0, name: 'cube' });
    await ok('create_region_separator', { s: 'left', t: 'cube', range: [-1, 1] });
    expect(await ok('sample', { separator: 'sep_1', points: [[-5, 0, 0], [3, 0, 0]] })).toMatchObject({
      values: [-1, 1],
    });
  });
});

describe('errors', () => {
  it('reports overlapping closed sets', async () => {
    const { isError, text } = await call('create_interval_separator', { s: [[0, 2]], t: [[1, 3]] });
    expect(isError).toBe(true);
    expect(text).toContain('Closed sets must be disjoint');
  });

  it('reports an empty interval', async () => {
    const { isError, text } = await call('create_interval_separator', { s: [[2, 1]], t: [[5, 6]] });
    expect(isError).toBe(true);
    expect(text).toContain('is empty');
  });

  it('reports a point of the wrong shape', async () => {
    await ok('create_interval_separator', RAYS);
    const { isError, text } = await call('evaluate', { separator: 'sep_1', point: [1, 2, 3] });
    expect(isError).toBe(true);
    expect(text).toContain('is on the real line');
  });

  it('reports unknown ids', async () => {
    const { isError, text } = await call('evaluate', { separator: 'nope', point: 0 });
    expect(isError).toBe(true);
    expect(text).toContain('Separator "nope" not found');
  });

  it('reports invalid names', async () => {
    const { isError, text } = await call('create_interval_separator', { ...RAYS, name: 'bad name' });
    expect(isError).toBe(true);
    expect(text).toContain('Invalid separator name');
  });
});

describe('registry tools', () => {
  it('lists and deletes separators', async () => {
    await ok('create_interval_separator', RAYS);
    await ok('create_interval_separator', { ...RAYS, name: 'second' });
    expect(await ok('list_separators')).toMatchObject({ count: 2 });
    expect(await ok('delete_separator', { separator: 'sep_1' })).toEqual({ deleted: 'sep_1', remaining: 1 });
    const { isError, text } = await call('delete_separator', { separator: 'sep_1' });
    expect(isError).toBe(true);
    expect(text).toContain('cannot delete');
  });
});

describe('configuration', () => {
  it('skips precondition checks when contracts are off', async () => {
    await closeAll();
    await connect({ ...TEST_CONFIG, checkContracts: false });
    expect(await ok('create_interval_separator', { s: [[0, 2]], t: [[1, 3]] })).toMatchObject({
      separator_id: 'sep_1',
    });
  });

  it('applies the default tolerance', async () => {
    await closeAll();
    await connect({ ...TEST_CONFIG, defaultTolerance: 0.25 });
    await ok('create_interval_separator', RAYS);
    expect(await ok('evaluate', { separator: 'sep_1', point: 0.3 })).toMatchObject({ depth: 2 });
  });
});
