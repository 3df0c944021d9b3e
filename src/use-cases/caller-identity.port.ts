import type { CallerIdentity, Credentials } from "../entities/aws-identity.js";

export interface CallerIdentityGateway {
    getCallerIdentity(): Promise<CallerIdentity>;
}

/** Builds a gateway that signs its calls with the given credentials. */
export type CallerIdentityGatewayFactory = (
    credentials: Credentials,
) => CallerIdentityGateway;
