import type { TransferResult } from "../entities/TransferRequest";

export interface ITransferJournal {
  findByIdempotencyKey(key: string): TransferResult | null;
  record(key: string, result: TransferResult): void;
}
