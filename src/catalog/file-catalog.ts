/**
 * JSON-file catalog loader.
 *
 * Reads an array of template entries and builds a StaticCatalog. An entry
 * that fails validation is skipped and logged; the rest still load.
 */

import fs from 'fs';
import { CatalogEntry, ParameterDefinition, PipelineTarget, StaticCatalog } from '../domain/catalog';
import { logger } from '../logger';

const PARAMETER_TYPES: ReadonlyArray<ParameterDefinition['type']> = ['string', 'number', 'select', 'boolean'];

const log = logger.child({ module: 'catalog' });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseParameter(raw: unknown): ParameterDefinition | null {
  if (!isRecord(raw) || typeof raw.name !== 'string' || raw.name.length === 0) return null;
  const type = PARAMETER_TYPES.find((t) => t === raw.type) ?? 'string';
  return {
    name: raw.name,
    label: optionalString(raw.label) ?? raw.name,
    type,
    required: raw.required !== false,
    default: raw.default === undefined || raw.default === null ? undefined : String(raw.default),
    options: Array.isArray(raw.options) ? raw.options.map(String) : undefined,
  };
}

function parsePipelineTarget(raw: unknown): PipelineTarget | null {
  if (!isRecord(raw)) return null;
  const pipelineId = Number(raw.pipelineId);
  if (typeof raw.project !== 'string' || raw.project.length === 0 || !Number.isInteger(pipelineId) || pipelineId <= 0) {
    return null;
  }
  return {
    project: raw.project,
    pipelineId,
    branch: optionalString(raw.branch) ?? 'main',
    moduleName: optionalString(raw.moduleName),
  };
}

/** Validate one raw entry. Returns the entry, or a message saying what is wrong. */
export function parseCatalogEntry(raw: unknown): CatalogEntry | string {
  if (!isRecord(raw)) return 'entry is not an object';
  if (typeof raw.id !== 'string' || raw.id.length === 0) return 'entry has no id';
  if (typeof raw.name !== 'string' || raw.name.length === 0) return `entry ${raw.id} has no name`;

  const schema = Array.isArray(raw.parameterSchema) ? raw.parameterSchema : [];
  const parameterSchema: ParameterDefinition[] = [];
  for (const p of schema) {
    const parsed = parseParameter(p);
    if (!parsed) return `entry ${raw.id} has an invalid parameter`;
    parameterSchema.push(parsed);
  }

  const pipelineTarget = raw.pipelineTarget === null || raw.pipelineTarget === undefined
    ? null
    : parsePipelineTarget(raw.pipelineTarget);
  if (raw.pipelineTarget && !pipelineTarget) {
    return `entry ${raw.id} has an invalid pipelineTarget`;
  }

  return { id: raw.id, name: raw.name, parameterSchema, pipelineTarget };
}

/** Build a catalog from already-parsed JSON. */
export function catalogFromJson(data: unknown): StaticCatalog {
  const entries: CatalogEntry[] = [];
  if (!Array.isArray(data)) {
    log.warn('Catalog is not a JSON array; loading nothing');
    return new StaticCatalog(entries);
  }
  data.forEach((raw, index) => {
    const parsed = parseCatalogEntry(raw);
    if (typeof parsed === 'string') {
      log.warn('Skipping catalog entry', { index, reason: parsed });
    } else {
      entries.push(parsed);
    }
  });
  return new StaticCatalog(entries);
}

/** Load a catalog file. A missing file yields an empty catalog. */
export function loadCatalogFile(filePath: string): StaticCatalog {
  if (!fs.existsSync(filePath)) {
    log.warn('Catalog file not found; catalog is empty', { filePath });
    return new StaticCatalog();
  }
  const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return catalogFromJson(data);
}
