/**
 * MCP tool registrations for regions, separators and their evaluation.
 *
 * Every mutating tool returns JSON with an id and a readback so the LLM
 * always knows the current state after every operation. Kernel errors
 * propagate; the SDK reports them as tool errors.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  IntervalSet, interval, separateIntervals, separateRegions,
  sphere, box, halfSpace, MAX_DEPTH,
  type IntervalSeparator, type RegionSeparator, type SeparationOptions, type Vec3,
} from '@urysohn/kernel';
import * as registry from './registry.js';
import type { ServerConfig } from './config.js';

// ─── Input schemas ─────────────────────────────────────────────

const nameSchema = z.string().optional()
  .describe('Optional name for the result (letters, digits, hyphens, underscores only)');

const intervalSetSchema = z.array(z.tuple([z.number().nullable(), z.number().nullable()])).min(1).max(1000)
  .describe('Closed intervals [lo, hi]; null for an unbounded end');

const pointSchema = z.union([z.number(), z.tuple([z.number(), z.number(), z.number()])])
  .describe('A number for interval separators, [x, y, z] for region separators');

const rangeSchema = z.tuple([z.number().finite(), z.number().finite()]).optional()
  .describe('Output values [on s, on t]. Default [0, 1]');

const toleranceSchema = z.number().positive().finite().optional()
  .describe('Evaluation tolerance. Defaults to the server setting');

type PointInput = z.infer<typeof pointSchema>;

// ─── Helpers ───────────────────────────────────────────────────

function toIntervalSet(pairs: Array<[number | null, number | null]>): IntervalSet {
  return IntervalSet.of(...pairs.map(([lo, hi]) => {
    const a = lo ?? -Infinity;
    const b = hi ?? Infinity;
    if (a > b) throw new Error(`Interval [${a}, ${b}] is empty: lo must not exceed hi`);
    return interval(a, b, true, true);
  }));
}

function text(result: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(result) }] };
}

/** Dispatch on the separator's space, checking the point has the matching shape. */
function withPoint<T>(
  entry: registry.SeparatorEntry,
  point: PointInput,
  onInterval: (fn: IntervalSeparator, x: number) => T,
  onRegion: (fn: RegionSeparator, p: Vec3) => T,
): T {
  if (entry.kind === 'interval') {
    if (typeof point !== 'number') {
      throw new Error(`Separator "${entry.id}" is on the real line. Pass a number, got [${point.join(', ')}].`);
    }
    return onInterval(entry.fn, point);
  }
  if (typeof point === 'number') {
    throw new Error(`Separator "${entry.id}" is on R^3. Pass [x, y, z], got ${point}.`);
  }
  return onRegion(entry.fn, point);
}

function evaluateEntry(entry: registry.SeparatorEntry, point: PointInput, tolerance: number | undefined) {
  const est = withPoint(
    entry,
    point,
    (fn, x) => fn.estimate(x, tolerance),
    (fn, p) => fn.estimate(p, tolerance),
  );
  const [low, high] = entry.fn.range;
  return {
    value: low + (high - low) * est.value,
    unit_value: est.value,
    depth: est.depth,
    error_bound: est.errorBound * Math.abs(high - low),
    exact: est.exact,
  };
}

interface CertificateView {
  bound: number;
  insideLeft: number;
  outsideLeft: number;
  radius: number;
  neighborhood?: string;
}

function counts(c: { bound: number; insideLeft: number; outsideLeft: number }) {
  return { bound: c.bound, insideLeft: c.insideLeft, outsideLeft: c.outsideLeft };
}

// ─── Registration ──────────────────────────────────────────────

export function registerTools(server: McpServer, config: ServerConfig): void {

  function options(range: [number, number] | undefined, tolerance: number | undefined): SeparationOptions {
    return {
      range,
      tolerance: tolerance ?? config.defaultTolerance,
      checkContracts: config.checkContracts,
    };
  }

  // ─── Regions (6) ────────────────────────────────────────────

  server.tool(
    'create_sphere_region',
    'Create a sphere field |p| - r centered at origin. Its closed region is the solid ball.',
    {
      radius: z.number().positive().describe('Radius'),
      name: nameSchema,
    },
    async ({ radius, name }) => text(registry.createRegion(sphere(radius), 'sphere', name))
  );

  server.tool(
    'create_box_region',
    'Create an axis-aligned box field centered at origin.',
    {
      width: z.number().positive().describe('Width (X dimension)'),
      height: z.number().positive().describe('Height (Y dimension)'),
      depth: z.number().positive().describe('Depth (Z dimension)'),
      name: nameSchema,
    },
    async ({ width, height, depth, name }) => text(registry.createRegion(box(width, height, depth), 'box', name))
  );

  server.tool(
    'create_halfspace_region',
    'Create a half-space field. Points where dot(p, normal) ≤ offset form its closed region.',
    {
      normal_x: z.number().describe('Normal X component'),
      normal_y: z.number().describe('Normal Y component'),
      normal_z: z.number().describe('Normal Z component'),
      offset: z.number().describe('Offset along normal'),
      name: nameSchema,
    },
    async ({ normal_x, normal_y, normal_z, offset, name }) =>
      text(registry.createRegion(halfSpace([normal_x, normal_y, normal_z], offset), 'halfspace', name))
  );

  server.tool(
    'translate_region',
    'Move a region. Returns a new region (original unchanged).',
    {
      region: z.string().describe('ID of region to move'),
      x: z.number().describe('Translation in X'),
      y: z.number().describe('Translation in Y'),
      z: z.number().describe('Translation in Z'),
      name: nameSchema,
    },
    async ({ region, x, y, z: tz, name }) => {
      const field = registry.getRegion(region).field;
      return text(registry.createRegion(field.translate(x, y, tz), 'translate', name));
    }
  );

  server.tool(
    'union_regions',
    'Combine two regions into one.',
    {
      region_a: z.string().describe('ID of first region'),
      region_b: z.string().describe('ID of second region'),
      name: nameSchema,
    },
    async ({ region_a, region_b, name }) => {
      const a = registry.getRegion(region_a).field;
      const b = registry.getRegion(region_b).field;
      return text(registry.createRegion(a.union(b), 'union', name));
    }
  );

  server.tool(
    'list_regions',
    'List all regions with their field and Lipschitz constant.',
    {},
    async () => {
      const regions = registry.listRegions();
      return text({ count: regions.length, regions });
    }
  );

  // ─── Separators (2) ─────────────────────────────────────────

  server.tool(
    'create_interval_separator',
    'Build a continuous function on the real line that is range[0] on s and range[1] on t. s and t must be disjoint.',
    {
      s: intervalSetSchema,
      t: intervalSetSchema,
      range: rangeSchema,
      tolerance: toleranceSchema,
      name: nameSchema,
    },
    async ({ s, t, range, tolerance, name }) => {
      const fn = separateIntervals(toIntervalSet(s), toIntervalSet(t), options(range, tolerance));
      return text(registry.createSeparator({ kind: 'interval', fn }, name));
    }
  );

  server.tool(
    'create_region_separator',
    'Build a continuous function on R^3 that is range[0] on region s and range[1] on region t. The closed regions must be disjoint.',
    {
      s: z.string().describe('ID of the region where the function is range[0]'),
      t: z.string().describe('ID of the region where the function is range[1]'),
      range: rangeSchema,
      tolerance: toleranceSchema,
      name: nameSchema,
    },
    async ({ s, t, range, tolerance, name }) => {
      const fn = separateRegions(
        registry.getRegion(s).field,
        registry.getRegion(t).field,
        options(range, tolerance),
      );
      return text(registry.createSeparator({ kind: 'region', fn }, name));
    }
  );

  // ─── Evaluation (4) ─────────────────────────────────────────

  server.tool(
    'evaluate',
    'Evaluate a separator at a point, with the depth used and a bound on the error.',
    {
      separator: z.string().describe('ID of separator'),
      point: pointSchema,
      tolerance: toleranceSchema,
    },
    async ({ separator, point, tolerance }) => {
      const entry = registry.getSeparator(separator);
      return text({ separator, point, ...evaluateEntry(entry, point, tolerance) });
    }
  );

  server.tool(
    'approximate',
    'Depth-n dyadic approximation of a separator at a point. Non-decreasing in depth.',
    {
      separator: z.string().describe('ID of separator'),
      point: pointSchema,
      depth: z.number().int().min(0).max(MAX_DEPTH).describe('Approximation depth'),
    },
    async ({ separator, point, depth }) => {
      const entry = registry.getSeparator(separator);
      const value = withPoint(entry, point, (fn, x) => fn.approx(x, depth), (fn, p) => fn.approx(p, depth));
      return text({ separator, point, depth, value });
    }
  );

  server.tool(
    'sample',
    'Evaluate a separator at many points.',
    {
      separator: z.string().describe('ID of separator'),
      points: z.array(pointSchema).min(1).max(10000).describe('Points to evaluate (max 10,000)'),
      tolerance: toleranceSchema,
    },
    async ({ separator, points, tolerance }) => {
      const entry = registry.getSeparator(separator);
      const values = points.map((p) => evaluateEntry(entry, p, tolerance).value);
      return text({ separator, count: values.length, values });
    }
  );

  server.tool(
    'certify_continuity',
    'Find a neighborhood of a point on which the separator moves by at most (3/4)^level of its range.',
    {
      separator: z.string().describe('ID of separator'),
      point: pointSchema,
      level: z.number().int().min(0).describe('Certificate level (cost grows as 2^level)'),
    },
    async ({ separator, point, level }) => {
      if (level > config.maxCertifyLevel) {
        throw new Error(`Level ${level} exceeds the server limit of ${config.maxCertifyLevel}.`);
      }
      const entry = registry.getSeparator(separator);
      const cert = withPoint<CertificateView>(
        entry,
        point,
        (fn, x) => {
          const c = fn.certify(x, level);
          return { ...counts(c), radius: c.neighborhood.radiusAt(x), neighborhood: c.neighborhood.toString() };
        },
        // level-set neighborhoods print as nested fields; the radius is what callers use
        (fn, p) => {
          const c = fn.certify(p, level);
          return { ...counts(c), radius: c.neighborhood.radiusAt(p) };
        },
      );
      const [low, high] = entry.fn.range;
      return text({
        separator,
        point,
        level,
        bound: cert.bound * Math.abs(high - low),
        // Infinity: the whole space
        radius: Number.isFinite(cert.radius) ? cert.radius : null,
        neighborhood: cert.neighborhood,
        inside_left: cert.insideLeft,
        outside_left: cert.outsideLeft,
      });
    }
  );

  // ─── Registry (2) ───────────────────────────────────────────

  server.tool(
    'list_separators',
    'List all separators with their sets, range and tolerance.',
    {},
    async () => {
      const separators = registry.listSeparators();
      return text({ count: separators.length, separators });
    }
  );

  server.tool(
    'delete_separator',
    'Remove a separator from the registry.',
    {
      separator: z.string().describe('ID of separator to delete'),
    },
    async ({ separator }) => {
      registry.removeSeparator(separator);
      return text({ deleted: separator, remaining: registry.listSeparators().length });
    }
  );
}
