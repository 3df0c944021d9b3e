import type { AssumeRoleGateway } from "./assume-role.port.js";
import { createCredentialAssumer } from "./assume-role.js";
import {
    type AutoAssumeOrchestrator,
    createAutoAssumeOrchestrator,
} from "./auto-assume.js";
import type {
    CallerIdentityGateway,
    CallerIdentityGatewayFactory,
} from "./caller-identity.port.js";
import { createTrustPolicyEditor } from "./edit-trust-policy.js";
import { createTrustEnsurer } from "./ensure-trust.js";
import { createTrustPolicyParser } from "./parse-trust-policy.js";
import type { ProgressReporter, Sleep } from "./progress-reporter.port.js";
import { createCallerIdentityResolver } from "./resolve-caller-identity.js";
import type { RoleStore } from "./role-store.port.js";
import type { AutoAssumeSettings } from "./settings.schema.js";
import { createCredentialVerifier } from "./verify-credentials.js";

export interface AutoAssumeGateways {
    readonly identity: CallerIdentityGateway;
    readonly roleStore: RoleStore;
    readonly assumeRole: AssumeRoleGateway;
    readonly identityFor: CallerIdentityGatewayFactory;
}

export interface AutoAssumeRuntime {
    readonly reporter: ProgressReporter;
    readonly sleep: Sleep;
}

export function createConfiguredAutoAssume(
    settings: AutoAssumeSettings,
    gateways: AutoAssumeGateways,
    runtime: AutoAssumeRuntime,
): AutoAssumeOrchestrator {
    return createAutoAssumeOrchestrator({
        identityResolver: createCallerIdentityResolver(gateways.identity),
        trustEnsurer: createTrustEnsurer({
            roleStore: gateways.roleStore,
            parser: createTrustPolicyParser(),
            editor: createTrustPolicyEditor(),
            reporter: runtime.reporter,
            sleep: runtime.sleep,
            propagationDelayMs: settings.propagationDelayMs,
        }),
        credentialAssumer: createCredentialAssumer({
            gateway: gateways.assumeRole,
            sessionName: settings.sessionName,
            durationSeconds: settings.durationSeconds,
        }),
        reporter: runtime.reporter,
        sleep: runtime.sleep,
        retry: {
            maxAttempts: settings.maxAttempts,
            initialBackoffMs: settings.initialBackoffMs,
            backoffMultiplier: settings.backoffMultiplier,
            maxBackoffMs: settings.maxBackoffMs,
        },
        verifier: settings.verify
            ? createCredentialVerifier(gateways.identityFor)
            : undefined,
    });
}
