import { isIamRoleArn, splitArnParts } from "@cloud-copilot/iam-utils";

/** Account of an ARN, or undefined when `arn` is not one. */
export function accountOfArn(arn: string): string | undefined {
    if (!arn.startsWith("arn:")) {
        return undefined;
    }
    return splitArnParts(arn).accountId || undefined;
}

/** Last path segment of a role ARN, `tester` for `role/ops/tester`. */
export function roleNameOfArn(roleArn: string): string | undefined {
    if (!isIamRoleArn(roleArn)) {
        return undefined;
    }
    return splitArnParts(roleArn).resourcePath?.split("/").pop();
}

/**
 * Whether `identityArn` is an STS session of `roleArn`, i.e.
 * `arn:<p>:sts::<account>:assumed-role/<name>/<session>` for
 * `arn:<p>:iam::<account>:role/<path/><name>`.
 */
export function isSessionOfRole(identityArn: string, roleArn: string): boolean {
    const roleName = roleNameOfArn(roleArn);
    if (!roleName || !identityArn.startsWith("arn:")) {
        return false;
    }

    const identity = splitArnParts(identityArn);
    const role = splitArnParts(roleArn);
    if (
        identity.service !== "sts" ||
        identity.resourceType !== "assumed-role" ||
        identity.partition !== role.partition ||
        identity.accountId !== role.accountId
    ) {
        return false;
    }

    const [sessionRoleName] = identity.resourcePath?.split("/") ?? [];
    return sessionRoleName === roleName;
}
