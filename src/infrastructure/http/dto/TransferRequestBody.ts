export type TransferRequestBody = {
  sender_id: string;
  recipient_id: string;
  amount: number;
  idempotency_key: string;
};
