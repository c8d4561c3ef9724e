import { randomUUID } from 'node:crypto';
import { parseTestDefinition } from './definition';
import { errorMessage } from './errors';
import { fromPostmanCollection, isPostmanCollection } from './postman';
import type { TestDefinition } from './types';

export interface StoredTest extends TestDefinition {
  id: string;
  enabled: boolean;
  createdAt: string;
  updatedAt: string;
  createdBy: string;
  version: number;
}

export interface TestStatistics {
  totalTests: number;
  enabledTests: number;
  disabledTests: number;
  methods: Record<string, number>;
  tags: Record<string, number>;
  lastCreated: string | null;
  lastTestName: string | null;
}

export interface TestExport {
  exportMetadata: {
    exportedAt: string;
    totalTests: number;
    version: string;
  };
  tests: StoredTest[];
}

/** What `import` does with an entry whose id is already stored. */
export type MergeStrategy = 'skip' | 'overwrite' | 'rename';

export interface ImportOutcome {
  imported: StoredTest[];
  /** Ids left untouched under the `skip` strategy */
  skipped: string[];
  /** Copies stored under a new id by the `rename` strategy */
  renamed: StoredTest[];
  failed: { index: number; error: string }[];
}

export interface TestStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

const UPDATABLE_FIELDS = [
  'name',
  'description',
  'method',
  'url',
  'headers',
  'body',
  'assertions',
  'tags',
  'timeoutSeconds',
] as const;

function readBoolean(input: unknown, key: string): boolean | undefined {
  if (typeof input === 'object' && input !== null && key in input) {
    const value: unknown = Reflect.get(input, key);
    if (typeof value === 'boolean') return value;
  }
  return undefined;
}

function readString(input: unknown, key: string): string | undefined {
  if (typeof input === 'object' && input !== null && key in input) {
    const value: unknown = Reflect.get(input, key);
    if (typeof value === 'string') return value;
  }
  return undefined;
}

function toDefinition(test: StoredTest): TestDefinition {
  const { enabled, createdAt, updatedAt, createdBy, version, ...definition } = test;
  return definition;
}

/**
 * In-memory test catalogue. One instance per running process; the execution
 * engine never reads from it directly.
 */
export class TestStore {
  private tests = new Map<string, StoredTest>();
  private now: () => Date;
  private generateId: () => string;

  constructor(options: TestStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  get size(): number {
    return this.tests.size;
  }

  /** Throws ValidationError when the input is not a runnable test. */
  create(input: unknown): StoredTest {
    return this.insert(input, this.tests.size, this.generateId());
  }

  private insert(input: unknown, index: number, id: string): StoredTest {
    const definition = parseTestDefinition(input, index);
    const timestamp = this.now().toISOString();
    const test: StoredTest = {
      ...definition,
      id,
      enabled: readBoolean(input, 'enabled') ?? true,
      createdAt: timestamp,
      updatedAt: timestamp,
      createdBy: readString(input, 'createdBy') ?? 'user',
      version: 1,
    };
    this.tests.set(id, test);
    return test;
  }

  private replace(existing: StoredTest, definition: TestDefinition, enabled: boolean | undefined): StoredTest {
    const replaced: StoredTest = {
      ...definition,
      id: existing.id,
      enabled: enabled ?? existing.enabled,
      createdAt: existing.createdAt,
      updatedAt: this.now().toISOString(),
      createdBy: existing.createdBy,
      version: existing.version + 1,
    };
    this.tests.set(existing.id, replaced);
    return replaced;
  }

  get(id: string): StoredTest | undefined {
    return this.tests.get(id);
  }

  /** Newest first. */
  list(filter: { tags?: string[]; enabledOnly?: boolean } = {}): StoredTest[] {
    let tests = [...this.tests.values()].reverse();
    const { tags } = filter;
    if (tags && tags.length > 0) {
      tests = tests.filter((t) => (t.tags || []).some((tag) => tags.includes(tag)));
    }
    if (filter.enabledOnly) {
      tests = tests.filter((t) => t.enabled);
    }
    return tests.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  update(id: string, patch: Record<string, unknown>): StoredTest | undefined {
    const existing = this.tests.get(id);
    if (!existing) return undefined;

    const merged: Record<string, unknown> = { ...toDefinition(existing) };
    UPDATABLE_FIELDS.forEach((field) => {
      if (field in patch) merged[field] = patch[field];
    });
    return this.replace(existing, parseTestDefinition(merged), readBoolean(patch, 'enabled'));
  }

  delete(id: string): boolean {
    return this.tests.delete(id);
  }

  duplicate(id: string, newName?: string): StoredTest | undefined {
    const original = this.tests.get(id);
    if (!original) return undefined;
    const { id: _id, createdAt, updatedAt, version, ...rest } = original;
    return this.create({ ...rest, name: newName || `${original.name} (Copy)` });
  }

  findByUrl(fragment: string): StoredTest[] {
    const needle = fragment.toLowerCase();
    return [...this.tests.values()].filter((t) => t.url.toLowerCase().includes(needle));
  }

  statistics(): TestStatistics {
    const all = [...this.tests.values()];
    const methods: Record<string, number> = {};
    const tags: Record<string, number> = {};
    let latest: StoredTest | undefined;

    for (const test of all) {
      methods[test.method] = (methods[test.method] || 0) + 1;
      (test.tags || []).forEach((tag) => {
        tags[tag] = (tags[tag] || 0) + 1;
      });
      if (!latest || test.createdAt >= latest.createdAt) latest = test;
    }

    const enabledTests = all.filter((t) => t.enabled).length;
    return {
      totalTests: all.length,
      enabledTests,
      disabledTests: all.length - enabledTests,
      methods,
      tags,
      lastCreated: latest?.createdAt ?? null,
      lastTestName: latest?.name ?? null,
    };
  }

  export(ids?: string[]): TestExport {
    const tests = ids
      ? ids.flatMap((id) => {
          const test = this.tests.get(id);
          return test ? [test] : [];
        })
      : [...this.tests.values()];
    return {
      exportMetadata: {
        exportedAt: this.now().toISOString(),
        totalTests: tests.length,
        version: '1.0',
      },
      tests,
    };
  }

  /**
   * Accepts an export payload, a bare array of tests, or a Postman
   * collection. Entries keep their id; `strategy` decides what happens when
   * that id is already stored. Invalid entries are reported, the rest are
   * stored.
   */
  import(payload: unknown, strategy: MergeStrategy = 'skip'): ImportOutcome {
    const outcome: ImportOutcome = { imported: [], skipped: [], renamed: [], failed: [] };

    let entries: unknown[];
    if (isPostmanCollection(payload)) {
      const { tests, skipped } = fromPostmanCollection(payload);
      entries = tests;
      skipped.forEach((error) => outcome.failed.push({ index: -1, error }));
    } else if (Array.isArray(payload)) {
      entries = payload;
    } else if (typeof payload === 'object' && payload !== null && 'tests' in payload && Array.isArray(payload.tests)) {
      entries = payload.tests;
    } else {
      outcome.failed.push({ index: -1, error: 'Unrecognised import format' });
      return outcome;
    }

    entries.forEach((entry, index) => {
      try {
        const id = readString(entry, 'id');
        const existing = id === undefined ? undefined : this.tests.get(id);
        if (!existing) {
          outcome.imported.push(this.insert(entry, index, id || this.generateId()));
        } else if (strategy === 'skip') {
          outcome.skipped.push(existing.id);
        } else if (strategy === 'overwrite') {
          outcome.imported.push(this.replace(existing, parseTestDefinition(entry, index), readBoolean(entry, 'enabled')));
        } else {
          const name = readString(entry, 'name') || 'Imported Test';
          const renamed = typeof entry === 'object' && entry !== null ? { ...entry, name: `${name} (Imported)` } : entry;
          outcome.renamed.push(this.insert(renamed, index, this.generateId()));
        }
      } catch (error) {
        outcome.failed.push({ index, error: errorMessage(error) });
      }
    });
    return outcome;
  }

  /** Stored tests as plain definitions, ready for runBatch. */
  definitions(filter: { ids?: string[]; enabledOnly?: boolean } = {}): TestDefinition[] {
    const { ids } = filter;
    return [...this.tests.values()]
      .filter((t) => !ids || ids.includes(t.id))
      .filter((t) => !filter.enabledOnly || t.enabled)
      .map(toDefinition);
  }
}
