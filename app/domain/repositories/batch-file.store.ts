import type { BatchLineRequest } from '../adaptors';
import type { BatchLineResult } from '../entities';

export interface BatchFileStore {
  /** Parses a JSONL input file. Malformed lines are a ValidationError naming the line. */
  readInput(path: string, model: string): Promise<BatchLineRequest[]>;
  /** Writes one JSON line per input line and returns the file location. */
  writeResults(outputFolder: string, batchId: string, lines: readonly BatchLineResult[]): Promise<string>;
}
