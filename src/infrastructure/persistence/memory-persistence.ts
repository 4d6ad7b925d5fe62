import type { z } from 'zod/v4';
import type { IPersistence } from '@domain/ports/persistence.js';

/**
 * In-memory implementation of IPersistence for use in unit tests.
 *
 * Stores data in a Map keyed by file path. `list(dirPath)` returns all
 * entries whose path starts with `dirPath + "/"`. `ensureDir()` is a no-op.
 * `failWrites` makes every later write throw, to exercise persist failures.
 *
 * Example:
 * ```ts
 * const store = new MemoryPersistence();
 * store.write('/journal/.vellum/catalog.json', catalog, CatalogSchema);
 * ```
 */
export class MemoryPersistence implements IPersistence {
  private readonly store = new Map<string, unknown>();
  failWrites = false;

  read<T>(filePath: string, schema: z.ZodType<T>): T {
    if (!this.store.has(filePath)) {
      throw new Error(`MemoryPersistence: file not found: ${filePath}`);
    }
    return schema.parse(this.store.get(filePath));
  }

  write<T>(filePath: string, data: T, schema: z.ZodType<T>): void {
    if (this.failWrites) {
      throw new Error(`MemoryPersistence: write refused for ${filePath}`);
    }
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new Error(`MemoryPersistence: validation failed for ${filePath}: ${JSON.stringify(result.error.issues)}`);
    }
    // Round-trip through JSON so stored values behave like file contents.
    this.store.set(filePath, JSON.parse(JSON.stringify(result.data)));
  }

  exists(filePath: string): boolean {
    return this.store.has(filePath);
  }

  list<T>(dirPath: string, schema: z.ZodType<T>): T[] {
    const prefix = dirPath.endsWith('/') ? dirPath : `${dirPath}/`;
    const results: T[] = [];
    for (const [key, value] of this.store) {
      if (!key.startsWith(prefix)) continue;
      // Only list direct children (no deeper nesting)
      const remainder = key.slice(prefix.length);
      if (remainder.includes('/')) continue;
      const parsed = schema.safeParse(value);
      if (parsed.success) {
        results.push(parsed.data);
      }
    }
    return results;
  }

  rename(fromPath: string, toPath: string): void {
    if (!this.store.has(fromPath)) {
      throw new Error(`MemoryPersistence: file not found: ${fromPath}`);
    }
    this.store.set(toPath, this.store.get(fromPath));
    this.store.delete(fromPath);
  }

  /** Store a raw value without validation, e.g. a damaged document. */
  seed(filePath: string, value: unknown): void {
    this.store.set(filePath, value);
  }

  /** Raw stored value, for asserting on what was written. */
  peek(filePath: string): unknown {
    return this.store.get(filePath);
  }

  /** No-op — in-memory storage has no directory concept. */
  ensureDir(_dirPath: string): void {}
}
