/**
 * Append-only store of completed operations.
 */
import type { OperationRecord } from './types.js';

export class OperationHistory {
  private readonly records: OperationRecord[] = [];

  append(record: OperationRecord): void {
    this.records.push(record);
  }

  /**
   * Snapshot of all records in call order.
   */
  entries(): OperationRecord[] {
    return [...this.records];
  }

  last(): OperationRecord | undefined {
    return this.records[this.records.length - 1];
  }

  get size(): number {
    return this.records.length;
  }
}
