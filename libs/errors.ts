import type { ErrorObject } from "ajv";

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

/** Payload failed its JSON-schema contract. */
export class ContractError extends Error {
    readonly details: ErrorObject[];

    constructor(message: string, details: ErrorObject[] = []) {
        super(message);
        this.name = "ContractError";
        this.details = details;
    }
}

/** Advisory model call failed in transport or returned something unusable. */
export class AdvisoryError extends Error {
    readonly status: number | null;

    constructor(message: string, status: number | null = null) {
        super(message);
        this.name = "AdvisoryError";
        this.status = status;
    }
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
