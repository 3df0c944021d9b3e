import type { Credentials } from "../entities/aws-identity.js";
import { type BackoffPolicy, computeBackoffDelay } from "../entities/backoff.js";
import { AssumeRoleRejectedError } from "../entities/errors.js";
import type { CredentialAssumer } from "./assume-role.js";
import type { TrustEnsurer } from "./ensure-trust.js";
import type { ProgressReporter, Sleep } from "./progress-reporter.port.js";
import type { CallerIdentityResolver } from "./resolve-caller-identity.js";
import type { CredentialVerifier } from "./verify-credentials.js";

export interface AssumeRetryPolicy extends BackoffPolicy {
    /** Total assume-role attempts, including the first. */
    readonly maxAttempts: number;
}

export interface AutoAssumeDeps {
    readonly identityResolver: CallerIdentityResolver;
    readonly trustEnsurer: TrustEnsurer;
    readonly credentialAssumer: CredentialAssumer;
    readonly reporter: ProgressReporter;
    readonly sleep: Sleep;
    readonly retry: AssumeRetryPolicy;
    readonly verifier?: CredentialVerifier | undefined;
}

export interface AutoAssumeOrchestrator {
    execute(roleName: string): Promise<Credentials>;
}

export function createAutoAssumeOrchestrator(
    deps: AutoAssumeDeps,
): AutoAssumeOrchestrator {
    async function assumeWithRetry(roleArn: string): Promise<Credentials> {
        for (let attempt = 1; ; attempt++) {
            try {
                return await deps.credentialAssumer.assume(roleArn);
            } catch (error) {
                if (
                    !(error instanceof AssumeRoleRejectedError) ||
                    attempt >= deps.retry.maxAttempts
                ) {
                    throw error;
                }
                const delay = computeBackoffDelay(deps.retry, attempt);
                deps.reporter.warn(
                    `Assuming ${roleArn} was rejected (attempt ${attempt}/${deps.retry.maxAttempts}), retrying in ${delay}ms`,
                );
                await deps.sleep(delay);
            }
        }
    }

    return {
        async execute(roleName: string): Promise<Credentials> {
            const caller = await deps.identityResolver.resolve();
            deps.reporter.info(`Running as ${caller.arn}`);

            const role = await deps.trustEnsurer.ensureTrust(
                roleName,
                caller.arn,
            );
            const credentials = await assumeWithRetry(role.roleArn);
            deps.reporter.info(
                `Assumed ${role.roleArn} until ${credentials.expiration.toISOString()}`,
            );

            if (deps.verifier) {
                const identity = await deps.verifier.verify(
                    credentials,
                    role.roleArn,
                );
                deps.reporter.info(`Verified credentials as ${identity.arn}`);
            }

            return credentials;
        },
    };
}
