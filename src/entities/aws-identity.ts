import type { TrustPolicyDocument } from "./trust-policy.js";

export interface CallerIdentity {
    readonly arn: string;
    readonly account?: string | undefined;
    readonly userId?: string | undefined;
}

export interface Role {
    readonly roleName: string;
    readonly roleArn: string;
    readonly trustPolicy: TrustPolicyDocument;
}

export interface Credentials {
    readonly accessKeyId: string;
    readonly secretAccessKey: string;
    readonly sessionToken: string;
    readonly expiration: Date;
}
