import type { Role } from "../entities/aws-identity.js";
import type { TrustPolicyEditor } from "./edit-trust-policy.js";
import type { TrustPolicyParser } from "./parse-trust-policy.js";
import type { ProgressReporter, Sleep } from "./progress-reporter.port.js";
import type { RoleStore } from "./role-store.port.js";

export interface TrustEnsurerDeps {
    readonly roleStore: RoleStore;
    readonly parser: TrustPolicyParser;
    readonly editor: TrustPolicyEditor;
    readonly reporter: ProgressReporter;
    readonly sleep: Sleep;
    /** Wait after a trust policy write, before the role is assumed. */
    readonly propagationDelayMs: number;
}

export interface TrustEnsurer {
    ensureTrust(roleName: string, callerArn: string): Promise<Role>;
}

export function createTrustEnsurer(deps: TrustEnsurerDeps): TrustEnsurer {
    return {
        async ensureTrust(roleName: string, callerArn: string): Promise<Role> {
            const record = await deps.roleStore.getRole(roleName);
            const current = deps.parser.parse(record.trustPolicyDocument);

            if (deps.editor.isCovered(current, callerArn)) {
                deps.reporter.info(
                    `${callerArn} is already allowed to assume ${roleName}`,
                );
                return {
                    roleName: record.roleName,
                    roleArn: record.roleArn,
                    trustPolicy: current,
                };
            }

            const updated = deps.editor.grantAssumeRole(current, callerArn);
            await deps.roleStore.replaceTrustPolicy(
                roleName,
                JSON.stringify(updated),
            );
            deps.reporter.info(
                `Updated the trust policy of ${roleName} to allow ${callerArn} to assume it`,
            );

            if (deps.propagationDelayMs > 0) {
                deps.reporter.info(
                    `Waiting ${deps.propagationDelayMs}ms for the trust policy update to propagate`,
                );
                await deps.sleep(deps.propagationDelayMs);
            }

            return {
                roleName: record.roleName,
                roleArn: record.roleArn,
                trustPolicy: updated,
            };
        },
    };
}
