export interface TransferRequest {
  senderId: string;
  recipientId: string;
  amount: number; // Whole units
  idempotencyKey: string;
}

export type TransferStatus = "COMPLETED" | "COMPLETED_PREVIOUSLY";

export interface TransferResult {
  txId: string;
  status: TransferStatus;
}
