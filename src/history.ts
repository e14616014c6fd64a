/**
 * Append-only reconstruction history.
 */

import { join } from "path";
import { z } from "zod";
import { JsonFile } from "./json-file.js";
import { ReconstructionRecordSchema } from "./schemas.js";
import type { ReconstructionRecord } from "./types.js";

export interface ReconstructionLog {
  append(record: ReconstructionRecord): Promise<void>;
  /** Records where the memory is the source or the target, oldest first. */
  forMemory(memoryId: string): Promise<ReconstructionRecord[]>;
  recent(limit: number): Promise<ReconstructionRecord[]>;
}

function involves(record: ReconstructionRecord, memoryId: string): boolean {
  return record.sourceId === memoryId || record.targetId === memoryId;
}

export class InMemoryReconstructionLog implements ReconstructionLog {
  private records: ReconstructionRecord[] = [];

  async append(record: ReconstructionRecord): Promise<void> {
    this.records.push(record);
  }

  async forMemory(memoryId: string): Promise<ReconstructionRecord[]> {
    return this.records.filter((r) => involves(r, memoryId));
  }

  async recent(limit: number): Promise<ReconstructionRecord[]> {
    return this.records.slice(-limit);
  }
}

const HistoryFileSchema = z.object({
  version: z.literal(1),
  records: z.array(ReconstructionRecordSchema),
});

type HistoryFile = z.infer<typeof HistoryFileSchema>;

export const HISTORY_FILE = "reconstruction-history.json";
const MAX_RECORDS = 1000;

/**
 * History kept in one JSON file, trimmed to the most recent records.
 */
export class JsonFileReconstructionLog implements ReconstructionLog {
  private file: JsonFile<HistoryFile>;

  constructor(dataDir: string, private maxRecords = MAX_RECORDS) {
    this.file = new JsonFile(
      join(dataDir, HISTORY_FILE),
      HistoryFileSchema,
      () => ({ version: 1, records: [] }),
      "history"
    );
  }

  async append(record: ReconstructionRecord): Promise<void> {
    const store = this.file.load();
    const records = [...store.records, record].slice(-this.maxRecords);
    this.file.save({ version: 1, records });
  }

  async forMemory(memoryId: string): Promise<ReconstructionRecord[]> {
    return this.file.load().records.filter((r) => involves(r, memoryId));
  }

  async recent(limit: number): Promise<ReconstructionRecord[]> {
    return this.file.load().records.slice(-limit);
  }
}
