import { isSessionOfRole } from "../entities/arn.js";
import type { CallerIdentity, Credentials } from "../entities/aws-identity.js";
import { CredentialVerificationError } from "../entities/errors.js";
import type { CallerIdentityGatewayFactory } from "./caller-identity.port.js";

export interface CredentialVerifier {
    verify(credentials: Credentials, roleArn: string): Promise<CallerIdentity>;
}

export function createCredentialVerifier(
    gatewayFor: CallerIdentityGatewayFactory,
): CredentialVerifier {
    return {
        async verify(
            credentials: Credentials,
            roleArn: string,
        ): Promise<CallerIdentity> {
            const identity = await gatewayFor(credentials).getCallerIdentity();
            if (!isSessionOfRole(identity.arn, roleArn)) {
                throw new CredentialVerificationError(
                    `Issued credentials resolve to ${identity.arn}, not a session of ${roleArn}`,
                );
            }
            return identity;
        },
    };
}
