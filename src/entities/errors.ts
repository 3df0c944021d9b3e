export class AutoAssumeError extends Error {
    readonly retryable: boolean = false;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class SettingsError extends AutoAssumeError {}

export class IdentityResolutionError extends AutoAssumeError {}

export class RoleNotFoundError extends AutoAssumeError {
    constructor(
        readonly roleName: string,
        options?: ErrorOptions,
    ) {
        super(`Role ${roleName} does not exist`, options);
    }
}

export class MalformedPolicyError extends AutoAssumeError {}

export class InsufficientPermissionError extends AutoAssumeError {}

export class PolicyUpdateError extends AutoAssumeError {}

/** IAM could not be asked for the role, e.g. throttled or unreachable. */
export class RoleLookupError extends AutoAssumeError {}

/**
 * The trust relationship did not authorize the caller. Usually the previous
 * trust policy write has not propagated yet, so the exchange may be retried.
 */
export class AssumeRoleRejectedError extends AutoAssumeError {
    override readonly retryable = true;
}

export class AssumeRoleDeniedError extends AutoAssumeError {}

export class CredentialVerificationError extends AutoAssumeError {}
