/**
 * Catalog collaborator contract.
 *
 * The catalog loader itself lives outside the engine; the engine only
 * resolves a template id to its parameter schema and pipeline target.
 */

/** A parameter a template accepts. */
export interface ParameterDefinition {
  name: string;
  label: string;
  type: 'string' | 'number' | 'select' | 'boolean';
  required: boolean;
  default?: string;
  options?: string[];
}

/** Where a template's pipeline lives. */
export interface PipelineTarget {
  project: string;
  pipelineId: number;
  branch: string;
  /** Module folder passed to a shared pipeline. */
  moduleName?: string;
}

/** The subset of a catalog entry the engine consumes. */
export interface CatalogEntry {
  id: string;
  name: string;
  parameterSchema: ParameterDefinition[];
  pipelineTarget: PipelineTarget | null;
}

export interface CatalogLookup {
  getById(id: string): Promise<CatalogEntry | null>;
}

/** Catalog backed by a fixed list of entries. */
export class StaticCatalog implements CatalogLookup {
  private entries = new Map<string, CatalogEntry>();

  constructor(entries: CatalogEntry[] = []) {
    for (const entry of entries) {
      this.entries.set(entry.id, entry);
    }
  }

  async getById(id: string): Promise<CatalogEntry | null> {
    return this.entries.get(id) ?? null;
  }
}
