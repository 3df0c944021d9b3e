import type { Credentials } from "../entities/aws-identity.js";

export interface AssumeRoleRequest {
    readonly roleArn: string;
    readonly sessionName: string;
    readonly durationSeconds?: number | undefined;
}

export interface AssumeRoleGateway {
    assumeRole(request: AssumeRoleRequest): Promise<Credentials>;
}
