import type { TransferRequestBody } from "../dto/TransferRequestBody";
import { accepted, rejected, type ParseResult } from "./parseResult";

function requiredString(value: unknown): string | null {
  if (typeof value !== "string" || value.trim() === "") return null;
  return value.trim();
}

export function parseTransferRequestBody(
  body: string | null
): ParseResult<TransferRequestBody> {
  if (!body) {
    return rejected("Request body is required");
  }

  let parsed: unknown;

  try {
    parsed = JSON.parse(body);
  } catch {
    return rejected("Invalid JSON body");
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return rejected("Invalid request body format");
  }

  const data = parsed as Record<string, unknown>;

  const senderId = requiredString(data.sender_id);
  if (senderId === null) {
    return rejected("sender_id is required");
  }

  const recipientId = requiredString(data.recipient_id);
  if (recipientId === null) {
    return rejected("recipient_id is required");
  }

  if (
    typeof data.amount !== "number" ||
    !Number.isSafeInteger(data.amount) ||
    data.amount <= 0
  ) {
    return rejected("amount must be a positive integer");
  }

  const idempotencyKey = requiredString(data.idempotency_key);
  if (idempotencyKey === null) {
    return rejected("idempotency_key is required");
  }

  return accepted({
    sender_id: senderId,
    recipient_id: recipientId,
    amount: data.amount,
    idempotency_key: idempotencyKey,
  });
}
