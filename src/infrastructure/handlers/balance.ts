import type {
  APIGatewayProxyEvent,
  APIGatewayProxyHandler,
  APIGatewayProxyResult,
} from "aws-lambda";
import type { IWireTransfers } from "../../core/repositories/IWireTransfers";
import { bank } from "../container";

export function createBalanceHandler(wireTransfers: IWireTransfers) {
  return async (
    event: Pick<APIGatewayProxyEvent, "pathParameters">
  ): Promise<APIGatewayProxyResult> => {
    const accountId = event.pathParameters?.accountId?.trim();
    if (!accountId) {
      return {
        statusCode: 400,
        body: JSON.stringify({ error: "accountId is required" }),
      };
    }

    return {
      statusCode: 200,
      body: JSON.stringify({ accountId, balance: wireTransfers.getFunds(accountId) }),
    };
  };
}

export const handler: APIGatewayProxyHandler = createBalanceHandler(bank);
