export interface RoleRecord {
    readonly roleName: string;
    readonly roleArn: string;
    /** The trust policy exactly as IAM returns it, usually URL-encoded JSON. */
    readonly trustPolicyDocument: string;
}

/**
 * Read-then-replace access to a role's trust policy. There is no
 * concurrency token: a replace overwrites whatever is stored at that moment.
 */
export interface RoleStore {
    getRole(roleName: string): Promise<RoleRecord>;
    replaceTrustPolicy(roleName: string, policyDocument: string): Promise<void>;
}
