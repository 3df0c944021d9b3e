import {
    AssumeRoleCommand,
    type AssumeRoleCommandOutput,
    GetCallerIdentityCommand,
    type GetCallerIdentityCommandOutput,
    type STSClient,
    STSServiceException,
} from "@aws-sdk/client-sts";
import type { CallerIdentity, Credentials } from "../entities/aws-identity.js";
import {
    AssumeRoleDeniedError,
    AssumeRoleRejectedError,
    IdentityResolutionError,
} from "../entities/errors.js";
import type {
    AssumeRoleGateway,
    AssumeRoleRequest,
} from "../use-cases/assume-role.port.js";
import type { CallerIdentityGateway } from "../use-cases/caller-identity.port.js";
import { describeError, isAccessDenied } from "./aws-errors.js";

const EXPLICIT_DENY = /explicit deny/i;

export type StsGateway = CallerIdentityGateway & AssumeRoleGateway;

function toAssumeRoleError(error: unknown, roleArn: string): Error {
    // STS answers a trust policy that does not (yet) name the caller with a
    // plain AccessDenied; explicit denies say so in the message.
    if (isAccessDenied(error) && !EXPLICIT_DENY.test(error.message)) {
        return new AssumeRoleRejectedError(
            `Not authorized to assume ${roleArn}: ${error.message}`,
            { cause: error },
        );
    }
    if (!(error instanceof STSServiceException)) {
        return new AssumeRoleDeniedError(
            `Could not reach STS to assume ${roleArn}: ${describeError(error)}`,
            { cause: error },
        );
    }
    return new AssumeRoleDeniedError(
        `STS refused to assume ${roleArn}: ${describeError(error)}`,
        { cause: error },
    );
}

export function createStsGateway(client: STSClient): StsGateway {
    return {
        async getCallerIdentity(): Promise<CallerIdentity> {
            let response: GetCallerIdentityCommandOutput;
            try {
                response = await client.send(new GetCallerIdentityCommand({}));
            } catch (error) {
                throw new IdentityResolutionError(
                    `Could not resolve the caller identity: ${describeError(error)}`,
                    { cause: error },
                );
            }
            if (!response.Arn) {
                throw new IdentityResolutionError(
                    "GetCallerIdentity returned no ARN",
                );
            }
            return {
                arn: response.Arn,
                account: response.Account,
                userId: response.UserId,
            };
        },

        async assumeRole(request: AssumeRoleRequest): Promise<Credentials> {
            let response: AssumeRoleCommandOutput;
            try {
                response = await client.send(
                    new AssumeRoleCommand({
                        RoleArn: request.roleArn,
                        RoleSessionName: request.sessionName,
                        DurationSeconds: request.durationSeconds,
                    }),
                );
            } catch (error) {
                throw toAssumeRoleError(error, request.roleArn);
            }

            const issued = response.Credentials;
            const accessKeyId = issued?.AccessKeyId;
            const secretAccessKey = issued?.SecretAccessKey;
            const sessionToken = issued?.SessionToken;
            const expiration = issued?.Expiration;
            if (
                !accessKeyId ||
                !secretAccessKey ||
                !sessionToken ||
                !expiration
            ) {
                throw new AssumeRoleDeniedError(
                    `AssumeRole returned incomplete credentials for ${request.roleArn}`,
                );
            }
            return { accessKeyId, secretAccessKey, sessionToken, expiration };
        },
    };
}
