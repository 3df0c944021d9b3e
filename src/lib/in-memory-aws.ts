import { accountOfArn, roleNameOfArn } from "../entities/arn.js";
import type { CallerIdentity, Credentials } from "../entities/aws-identity.js";
import {
    AssumeRoleRejectedError,
    IdentityResolutionError,
    InsufficientPermissionError,
    RoleNotFoundError,
} from "../entities/errors.js";
import type { TrustPolicyDocument } from "../entities/trust-policy.js";
import type {
    AssumeRoleGateway,
    AssumeRoleRequest,
} from "../use-cases/assume-role.port.js";
import type {
    CallerIdentityGateway,
    CallerIdentityGatewayFactory,
} from "../use-cases/caller-identity.port.js";
import { createTrustPolicyEditor } from "../use-cases/edit-trust-policy.js";
import { createTrustPolicyParser } from "../use-cases/parse-trust-policy.js";
import type { RoleRecord, RoleStore } from "../use-cases/role-store.port.js";

const DEFAULT_ACCOUNT = "123456789012";

interface StoredRole {
    readonly roleArn: string;
    policyDocument: string;
}

export interface TrustPolicyWrite {
    readonly roleName: string;
    readonly policyDocument: string;
}

export interface InMemoryRoleStore extends RoleStore {
    readonly writes: readonly TrustPolicyWrite[];
    trustPolicyOf(roleName: string): TrustPolicyDocument;
    /** Replaces a trust policy outside of this system, as another actor would. */
    overwrite(roleName: string, document: TrustPolicyDocument): void;
}

export interface InMemoryRoleStoreOptions {
    readonly account?: string;
    readonly roles: Readonly<Record<string, TrustPolicyDocument>>;
    readonly denyUpdates?: boolean;
    /** Runs between the read and the write of the next update, once. */
    readonly onBeforeNextWrite?: (store: InMemoryRoleStore) => void;
}

export function createInMemoryRoleStore(
    options: InMemoryRoleStoreOptions,
): InMemoryRoleStore {
    const account = options.account ?? DEFAULT_ACCOUNT;
    const parser = createTrustPolicyParser();
    const roles = new Map<string, StoredRole>();
    const writes: TrustPolicyWrite[] = [];
    let beforeNextWrite = options.onBeforeNextWrite;

    for (const [roleName, document] of Object.entries(options.roles)) {
        roles.set(roleName, {
            roleArn: `arn:aws:iam::${account}:role/${roleName}`,
            policyDocument: JSON.stringify(document),
        });
    }

    function find(roleName: string): StoredRole {
        const role = roles.get(roleName);
        if (!role) {
            throw new RoleNotFoundError(roleName);
        }
        return role;
    }

    const store: InMemoryRoleStore = {
        writes,

        async getRole(roleName: string): Promise<RoleRecord> {
            const role = find(roleName);
            return {
                roleName,
                roleArn: role.roleArn,
                trustPolicyDocument: encodeURIComponent(role.policyDocument),
            };
        },

        async replaceTrustPolicy(
            roleName: string,
            policyDocument: string,
        ): Promise<void> {
            const role = find(roleName);
            const hook = beforeNextWrite;
            beforeNextWrite = undefined;
            hook?.(store);
            if (options.denyUpdates) {
                throw new InsufficientPermissionError(
                    `Not authorized to update the trust policy of ${roleName}`,
                );
            }
            role.policyDocument = policyDocument;
            writes.push({ roleName, policyDocument });
        },

        trustPolicyOf(roleName: string): TrustPolicyDocument {
            return parser.parse(find(roleName).policyDocument);
        },

        overwrite(roleName: string, document: TrustPolicyDocument): void {
            find(roleName).policyDocument = JSON.stringify(document);
        },
    };
    return store;
}

export interface InMemorySts extends CallerIdentityGateway, AssumeRoleGateway {
    readonly assumeRequests: readonly AssumeRoleRequest[];
    readonly identityGatewayFor: CallerIdentityGatewayFactory;
}

export interface InMemoryStsOptions {
    readonly callerArn: string | undefined;
    readonly roleStore: InMemoryRoleStore;
    /** Number of assume attempts rejected after each trust policy write. */
    readonly propagationLagAttempts?: number;
    readonly now?: () => Date;
}

export function createInMemorySts(options: InMemoryStsOptions): InMemorySts {
    const editor = createTrustPolicyEditor();
    const assumeRequests: AssumeRoleRequest[] = [];
    const sessions = new Map<string, string>();
    let seenWrites = 0;
    let lagRemaining = 0;

    return {
        assumeRequests,

        async getCallerIdentity(): Promise<CallerIdentity> {
            if (options.callerArn === undefined) {
                throw new IdentityResolutionError(
                    "Unable to locate credentials",
                );
            }
            return {
                arn: options.callerArn,
                account: accountOfArn(options.callerArn),
            };
        },

        async assumeRole(request: AssumeRoleRequest): Promise<Credentials> {
            assumeRequests.push(request);

            if (options.roleStore.writes.length !== seenWrites) {
                seenWrites = options.roleStore.writes.length;
                lagRemaining = options.propagationLagAttempts ?? 0;
            }

            const roleName = roleNameOfArn(request.roleArn) ?? "";
            const callerArn = options.callerArn ?? "";
            const document = options.roleStore.trustPolicyOf(roleName);

            if (lagRemaining > 0 || !editor.isCovered(document, callerArn)) {
                lagRemaining = Math.max(lagRemaining - 1, 0);
                throw new AssumeRoleRejectedError(
                    `User: ${callerArn} is not authorized to perform: sts:AssumeRole on resource: ${request.roleArn}`,
                );
            }

            const now = options.now?.() ?? new Date();
            const accessKeyId = `ASIATEST${String(assumeRequests.length).padStart(4, "0")}`;
            sessions.set(
                accessKeyId,
                `arn:aws:sts::${accountOfArn(request.roleArn) ?? ""}:assumed-role/${roleName}/${request.sessionName}`,
            );
            return {
                accessKeyId,
                secretAccessKey: "test-secret",
                sessionToken: "test-session-token",
                expiration: new Date(
                    now.getTime() + (request.durationSeconds ?? 3600) * 1000,
                ),
            };
        },

        identityGatewayFor(credentials: Credentials): CallerIdentityGateway {
            return {
                async getCallerIdentity(): Promise<CallerIdentity> {
                    const arn = sessions.get(credentials.accessKeyId);
                    if (!arn) {
                        throw new IdentityResolutionError(
                            "The security token included in the request is invalid",
                        );
                    }
                    return { arn };
                },
            };
        },
    };
}
