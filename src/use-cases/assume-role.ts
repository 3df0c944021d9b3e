import type { Credentials } from "../entities/aws-identity.js";
import type { AssumeRoleGateway } from "./assume-role.port.js";

export interface CredentialAssumerDeps {
    readonly gateway: AssumeRoleGateway;
    readonly sessionName: string;
    readonly durationSeconds?: number | undefined;
}

export interface CredentialAssumer {
    assume(roleArn: string): Promise<Credentials>;
}

export function createCredentialAssumer(
    deps: CredentialAssumerDeps,
): CredentialAssumer {
    return {
        assume(roleArn: string): Promise<Credentials> {
            return deps.gateway.assumeRole({
                roleArn,
                sessionName: deps.sessionName,
                durationSeconds: deps.durationSeconds,
            });
        },
    };
}
