import { IAMClient } from "@aws-sdk/client-iam";
import { STSClient } from "@aws-sdk/client-sts";
import type { Credentials } from "../entities/aws-identity.js";

export interface AwsClientSettings {
    readonly region?: string | undefined;
    readonly profile?: string | undefined;
    readonly requestTimeoutMs: number;
}

function baseConfig(settings: AwsClientSettings) {
    return {
        region: settings.region,
        profile: settings.profile,
        requestHandler: {
            connectionTimeout: settings.requestTimeoutMs,
            requestTimeout: settings.requestTimeoutMs,
        },
    };
}

/** STS client on the ambient credential chain, or on `credentials` when given. */
export function createStsClient(
    settings: AwsClientSettings,
    credentials?: Credentials,
): STSClient {
    return new STSClient({
        ...baseConfig(settings),
        ...(credentials ? { credentials } : {}),
    });
}

export function createIamClient(settings: AwsClientSettings): IAMClient {
    return new IAMClient(baseConfig(settings));
}
