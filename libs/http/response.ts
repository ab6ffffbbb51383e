import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda";
import { ContractError } from "../errors";

/** The parts of a REST API proxy event the handlers read. */
export type HttpEvent = Pick<APIGatewayProxyEvent, "body" | "isBase64Encoded"> & {
    requestContext?: { requestId?: string };
};

export type HttpResult = APIGatewayProxyResult;

export function json(statusCode: number, body: unknown): HttpResult {
    return {
        statusCode,
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
    };
}

export function parseJsonBody(event: HttpEvent): unknown {
    const raw = event.body ?? "";
    const text = event.isBase64Encoded ? Buffer.from(raw, "base64").toString("utf8") : raw;
    if (!text.trim()) return {};
    try {
        return JSON.parse(text);
    } catch {
        throw new ContractError("Request body is not valid JSON");
    }
}
