import type { z } from 'zod/v4';

/**
 * Port interface for typed JSON persistence.
 *
 * File-path oriented to match the JsonStore implementation. `write` replaces
 * the target atomically: readers see the old document or the new one, never
 * a partial file.
 *
 * For unit tests that don't need real I/O, use MemoryPersistence from
 * `@infra/persistence/memory-persistence.js`.
 */
export interface IPersistence {
  read<T>(filePath: string, schema: z.ZodType<T>): T;
  write<T>(filePath: string, data: T, schema: z.ZodType<T>): void;
  exists(filePath: string): boolean;
  list<T>(dirPath: string, schema: z.ZodType<T>): T[];
  rename(fromPath: string, toPath: string): void;
  ensureDir(dirPath: string): void;
}
