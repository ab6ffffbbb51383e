import Ajv2020, { type ValidateFunction } from "ajv/dist/2020";
import type { SchemaObject } from "ajv";
import addFormats from "ajv-formats";
import { ContractError } from "../../errors";

// Schemas
import analyzeRequest from "../schemas/pgx.analyze.request.v1.json";
import report from "../schemas/pgx.report.v1.json";

const ajv = new Ajv2020({ allErrors: true, strict: false });
addFormats(ajv);

const compile = (schema: SchemaObject) => ajv.compile(schema);

// Compile validators once (cold start cost only)
const validators = {
    "pgx.analyze.request.v1": compile(analyzeRequest),
    "pgx.report.v1": compile(report),
} satisfies Record<string, ValidateFunction>;

export type SchemaName = keyof typeof validators;

export function validate<T>(schemaName: SchemaName, data: unknown): asserts data is T {
    const v = validators[schemaName];
    if (!v(data)) {
        const errors = v.errors ?? [];
        const messages = errors.map((e) => `${e.instancePath || "/"} ${e.message}`).join("; ");
        throw new ContractError(`Schema validation failed for ${schemaName}: ${messages}`, errors);
    }
}
