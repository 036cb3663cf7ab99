// Lambda handler for liveness checks: GET /health
import type { APIGatewayProxyStructuredResultV2 } from "aws-lambda";

export const handler = async (): Promise<APIGatewayProxyStructuredResultV2> => {
  return {
    statusCode: 200,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ status: "ok" }),
  };
};
