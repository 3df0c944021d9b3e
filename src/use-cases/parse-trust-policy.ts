import { MalformedPolicyError } from "../entities/errors.js";
import type { TrustPolicyDocument } from "../entities/trust-policy.js";
import { TrustPolicyDocumentSchema } from "./trust-policy.schema.js";

const DANGEROUS_KEYS = new Set(["__proto__", "constructor", "prototype"]);

export interface TrustPolicyParser {
    parse(rawDocument: string): TrustPolicyDocument;
}

function decodeDocument(rawDocument: string): string {
    const trimmed = rawDocument.trim();
    if (trimmed.startsWith("{")) {
        return trimmed;
    }
    try {
        return decodeURIComponent(trimmed);
    } catch (error) {
        throw new MalformedPolicyError(
            "Trust policy is neither JSON nor URL-encoded JSON",
            { cause: error },
        );
    }
}

export function createTrustPolicyParser(): TrustPolicyParser {
    return {
        parse(rawDocument: string): TrustPolicyDocument {
            const json = decodeDocument(rawDocument);

            let raw: unknown;
            try {
                raw = JSON.parse(json, (key, value: unknown) =>
                    DANGEROUS_KEYS.has(key) ? undefined : value,
                );
            } catch (error) {
                const message =
                    error instanceof Error ? error.message : String(error);
                throw new MalformedPolicyError(
                    `Trust policy is not valid JSON (${message})`,
                    { cause: error },
                );
            }

            const result = TrustPolicyDocumentSchema.safeParse(raw);
            if (!result.success) {
                const details = result.error.issues
                    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                    .join("; ");
                throw new MalformedPolicyError(
                    `Trust policy has an unexpected shape: ${details}`,
                    { cause: result.error },
                );
            }
            return result.data;
        },
    };
}
