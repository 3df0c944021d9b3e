import type { Credentials } from "../entities/aws-identity.js";
import type { OutputFormat } from "./settings.schema.js";

export interface CredentialsFormatter {
    format(credentials: Credentials, format: OutputFormat): string;
}

function shellQuote(value: string): string {
    return `'${value.replaceAll("'", `'\\''`)}'`;
}

export function createCredentialsFormatter(): CredentialsFormatter {
    return {
        format(credentials: Credentials, format: OutputFormat): string {
            if (format === "env") {
                return [
                    `export AWS_ACCESS_KEY_ID=${shellQuote(credentials.accessKeyId)}`,
                    `export AWS_SECRET_ACCESS_KEY=${shellQuote(credentials.secretAccessKey)}`,
                    `export AWS_SESSION_TOKEN=${shellQuote(credentials.sessionToken)}`,
                    `export AWS_CREDENTIAL_EXPIRATION=${shellQuote(credentials.expiration.toISOString())}`,
                ].join("\n");
            }

            // Same shape as an AWS CLI credential_process response.
            return JSON.stringify(
                {
                    Version: 1,
                    AccessKeyId: credentials.accessKeyId,
                    SecretAccessKey: credentials.secretAccessKey,
                    SessionToken: credentials.sessionToken,
                    Expiration: credentials.expiration.toISOString(),
                },
                null,
                2,
            );
        },
    };
}
