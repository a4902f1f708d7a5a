import type {
  APIGatewayProxyEvent,
  APIGatewayProxyHandler,
  APIGatewayProxyResult,
} from "aws-lambda";
import type { MakeTransferUseCase } from "../../core/use-cases/MakeTransferUseCase";
import { makeTransfer } from "../container";
import { parseTransferRequestBody } from "../http/parsers/parseTransferRequestBody";

const CLIENT_ERRORS = new Set([
  "Insufficient Funds",
  "Self-transfer forbidden",
  "Amount must be positive",
]);

export function createTransferHandler(useCase: MakeTransferUseCase) {
  return async (
    event: Pick<APIGatewayProxyEvent, "body">
  ): Promise<APIGatewayProxyResult> => {
    try {
      const parseResult = parseTransferRequestBody(event.body);
      if (!parseResult.success) {
        return {
          statusCode: 400,
          body: JSON.stringify({ error: parseResult.error }),
        };
      }

      const result = useCase.execute({
        senderId: parseResult.data.sender_id,
        recipientId: parseResult.data.recipient_id,
        amount: parseResult.data.amount,
        idempotencyKey: parseResult.data.idempotency_key,
      });

      return {
        statusCode: 200,
        body: JSON.stringify(result),
      };

    } catch (error: unknown) {
      console.error("Transfer Handler Error:", error);

      let statusCode = 500;
      let message = "Internal Server Error";

      if (error instanceof Error) {
        message = error.message;
        if (CLIENT_ERRORS.has(message)) statusCode = 400;
      }

      return {
        statusCode,
        body: JSON.stringify({ error: message }),
      };
    }
  };
}

export const handler: APIGatewayProxyHandler = createTransferHandler(makeTransfer);
