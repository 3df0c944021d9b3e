import type { CallerIdentity } from "../entities/aws-identity.js";
import { IdentityResolutionError } from "../entities/errors.js";
import type { CallerIdentityGateway } from "./caller-identity.port.js";

export interface CallerIdentityResolver {
    resolve(): Promise<CallerIdentity>;
}

export function createCallerIdentityResolver(
    gateway: CallerIdentityGateway,
): CallerIdentityResolver {
    return {
        async resolve(): Promise<CallerIdentity> {
            const identity = await gateway.getCallerIdentity();
            if (!identity.arn) {
                throw new IdentityResolutionError(
                    "Identity service returned no ARN for the current credentials",
                );
            }
            return identity;
        },
    };
}
