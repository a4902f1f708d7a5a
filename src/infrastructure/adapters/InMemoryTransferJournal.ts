import type { ITransferJournal } from "../../core/repositories/ITransferJournal";
import type { TransferResult } from "../../core/entities/TransferRequest";

export class InMemoryTransferJournal implements ITransferJournal {
  private readonly entries = new Map<string, TransferResult>();

  findByIdempotencyKey(key: string): TransferResult | null {
    return this.entries.get(key) ?? null;
  }

  record(key: string, result: TransferResult): void {
    this.entries.set(key, result);
  }
}
