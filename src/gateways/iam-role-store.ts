import {
    GetRoleCommand,
    type GetRoleCommandOutput,
    type IAMClient,
    NoSuchEntityException,
    UpdateAssumeRolePolicyCommand,
} from "@aws-sdk/client-iam";
import {
    InsufficientPermissionError,
    MalformedPolicyError,
    PolicyUpdateError,
    RoleLookupError,
    RoleNotFoundError,
} from "../entities/errors.js";
import type { RoleRecord, RoleStore } from "../use-cases/role-store.port.js";
import { describeError, isAccessDenied } from "./aws-errors.js";

export function createIamRoleStore(client: IAMClient): RoleStore {
    return {
        async getRole(roleName: string): Promise<RoleRecord> {
            let response: GetRoleCommandOutput;
            try {
                response = await client.send(
                    new GetRoleCommand({ RoleName: roleName }),
                );
            } catch (error) {
                if (error instanceof NoSuchEntityException) {
                    throw new RoleNotFoundError(roleName, { cause: error });
                }
                if (isAccessDenied(error)) {
                    throw new InsufficientPermissionError(
                        `Not authorized to read role ${roleName}: ${error.message}`,
                        { cause: error },
                    );
                }
                throw new RoleLookupError(
                    `Could not read role ${roleName}: ${describeError(error)}`,
                    { cause: error },
                );
            }

            const roleArn = response.Role?.Arn;
            const trustPolicyDocument = response.Role?.AssumeRolePolicyDocument;
            if (!roleArn || !trustPolicyDocument) {
                throw new MalformedPolicyError(
                    `GetRole returned no trust policy for ${roleName}`,
                );
            }
            return {
                roleName: response.Role?.RoleName ?? roleName,
                roleArn,
                trustPolicyDocument,
            };
        },

        async replaceTrustPolicy(
            roleName: string,
            policyDocument: string,
        ): Promise<void> {
            try {
                await client.send(
                    new UpdateAssumeRolePolicyCommand({
                        RoleName: roleName,
                        PolicyDocument: policyDocument,
                    }),
                );
            } catch (error) {
                if (error instanceof NoSuchEntityException) {
                    throw new RoleNotFoundError(roleName, { cause: error });
                }
                if (isAccessDenied(error)) {
                    throw new InsufficientPermissionError(
                        `Not authorized to update the trust policy of ${roleName}: ${error.message}`,
                        { cause: error },
                    );
                }
                throw new PolicyUpdateError(
                    `IAM rejected the trust policy update for ${roleName}: ${describeError(error)}`,
                    { cause: error },
                );
            }
        },
    };
}
