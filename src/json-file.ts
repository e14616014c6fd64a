/**
 * Single-file JSON persistence used by the history, ledger, procedural
 * and file-backed memory stores.
 *
 * Reads are validated; a missing or corrupt file is logged and treated as
 * empty. Writes that fail raise PersistenceError.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync } from "fs";
import { dirname } from "path";
import type { z } from "zod";
import { PersistenceError, errorMessage } from "./errors.js";

export class JsonFile<T> {
  constructor(
    readonly path: string,
    private schema: z.ZodType<T>,
    private empty: () => T,
    private label: string
  ) {}

  load(): T {
    if (!existsSync(this.path)) {
      return this.empty();
    }

    try {
      const raw: unknown = JSON.parse(readFileSync(this.path, "utf-8"));
      const result = this.schema.safeParse(raw);
      if (!result.success) {
        console.error(`[${this.label}] Ignoring invalid store at ${this.path}: ${result.error.issues[0]?.message}`);
        return this.empty();
      }
      return result.data;
    } catch (error) {
      console.error(`[${this.label}] Error loading ${this.path}:`, error);
      return this.empty();
    }
  }

  save(data: T): void {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      // Write to a sibling temp file, then rename over the target
      const tmp = `${this.path}.tmp`;
      writeFileSync(tmp, JSON.stringify(data, null, 2));
      renameSync(tmp, this.path);
    } catch (error) {
      throw new PersistenceError(`[${this.label}] Failed to write ${this.path}: ${errorMessage(error)}`, false, error);
    }
  }
}
