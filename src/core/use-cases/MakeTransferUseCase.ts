import { v4 as uuidv4 } from "uuid";
import type { IWireTransfers } from "../repositories/IWireTransfers";
import type { ITransferJournal } from "../repositories/ITransferJournal";
import type { TransferRequest, TransferResult } from "../entities/TransferRequest";

export class MakeTransferUseCase {
  constructor(
    private readonly bank: IWireTransfers,
    private readonly journal: ITransferJournal
  ) {}

  execute(request: TransferRequest): TransferResult {
    if (!Number.isSafeInteger(request.amount) || request.amount <= 0) {
      throw new Error("Amount must be positive");
    }
    if (request.senderId === request.recipientId) throw new Error("Self-transfer forbidden");

    const existingTx = this.journal.findByIdempotencyKey(request.idempotencyKey);
    if (existingTx) {
      console.log(`Idempotency key ${request.idempotencyKey} already used, returning previous result.`);
      return { txId: existingTx.txId, status: "COMPLETED_PREVIOUSLY" };
    }

    if (!this.bank.transferFunds(request.amount, request.senderId, request.recipientId)) {
      throw new Error("Insufficient Funds");
    }

    const result: TransferResult = { txId: uuidv4(), status: "COMPLETED" };
    this.journal.record(request.idempotencyKey, result);
    return result;
  }
}
