/**
 * Registry: in-memory named regions and separators.
 *
 * Every mutating MCP tool stores its result here and returns
 * a structured readback so the LLM always knows the current state.
 */

import type { Field, IntervalSeparator, RegionSeparator, SeparatorReadback } from '@urysohn/kernel';

const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

function checkName(name: string | undefined, what: string): void {
  if (name !== undefined && !NAME_PATTERN.test(name)) {
    throw new Error(`Invalid ${what} name "${name}". Use only letters, digits, hyphens, underscores.`);
  }
}

// ─── Regions ────────────────────────────────────────────────────

export interface RegionEntry {
  id: string;
  field: Field;
  type: string;
}

export interface RegionResult {
  region_id: string;
  type: string;
  readback: {
    field: string;
    lipschitz: number;
  };
}

let nextRegionId = 1;
const regions = new Map<string, RegionEntry>();

function regionResult(entry: RegionEntry): RegionResult {
  return {
    region_id: entry.id,
    type: entry.type,
    readback: { field: entry.field.name, lipschitz: entry.field.lipschitz },
  };
}

/** Store a region field and return its ID + readback. */
export function createRegion(field: Field, type: string, name?: string): RegionResult {
  checkName(name, 'region');
  let id = name ?? `region_${nextRegionId++}`;
  // Auto-generated id taken by an explicit name: bump
  while (name === undefined && regions.has(id)) id = `region_${nextRegionId++}`;
  const entry = { id, field, type };
  regions.set(id, entry);
  return regionResult(entry);
}

/** Retrieve a region or throw a clear error. */
export function getRegion(id: string): RegionEntry {
  const entry = regions.get(id);
  if (!entry) {
    throw new Error(`Region "${id}" not found. Available regions: [${[...regions.keys()].join(', ')}]`);
  }
  return entry;
}

export function listRegions(): RegionResult[] {
  return [...regions.values()].map(regionResult);
}

// ─── Separators ─────────────────────────────────────────────────

export type SeparatorEntry =
  | { id: string; kind: 'interval'; fn: IntervalSeparator }
  | { id: string; kind: 'region'; fn: RegionSeparator };

export type NewSeparator =
  | { kind: 'interval'; fn: IntervalSeparator }
  | { kind: 'region'; fn: RegionSeparator };

export interface SeparatorResult {
  separator_id: string;
  kind: SeparatorEntry['kind'];
  readback: SeparatorReadback;
}

let nextSeparatorId = 1;
const separators = new Map<string, SeparatorEntry>();

function separatorResult(entry: SeparatorEntry): SeparatorResult {
  return { separator_id: entry.id, kind: entry.kind, readback: entry.fn.readback() };
}

export function createSeparator(separator: NewSeparator, name?: string): SeparatorResult {
  checkName(name, 'separator');
  let id = name ?? `sep_${nextSeparatorId++}`;
  while (name === undefined && separators.has(id)) id = `sep_${nextSeparatorId++}`;
  const entry: SeparatorEntry = separator.kind === 'interval'
    ? { id, kind: 'interval', fn: separator.fn }
    : { id, kind: 'region', fn: separator.fn };
  separators.set(id, entry);
  return separatorResult(entry);
}

export function getSeparator(id: string): SeparatorEntry {
  const entry = separators.get(id);
  if (!entry) {
    throw new Error(
      `Separator "${id}" not found. Available separators: [${[...separators.keys()].join(', ')}]`,
    );
  }
  return entry;
}

export function removeSeparator(id: string): void {
  if (!separators.delete(id)) {
    throw new Error(`Separator "${id}" not found: cannot delete.`);
  }
}

export function listSeparators(): SeparatorResult[] {
  return [...separators.values()].map(separatorResult);
}

/** Clear all regions and separators (for testing). */
export function clear(): void {
  regions.clear();
  separators.clear();
  nextRegionId = 1;
  nextSeparatorId = 1;
}
