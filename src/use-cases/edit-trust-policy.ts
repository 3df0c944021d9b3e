import {
    ASSUME_ROLE_ACTION,
    type PolicyValue,
    type TrustPolicyDocument,
    type TrustPolicyStatement,
} from "../entities/trust-policy.js";

const ASSUME_ROLE_ACTIONS = new Set(["sts:assumerole", "sts:*", "*"]);

function toArray(value: PolicyValue | undefined): readonly string[] {
    if (value === undefined) {
        return [];
    }
    return typeof value === "string" ? [value] : value;
}

function allowsAssumeRole(statement: TrustPolicyStatement): boolean {
    return toArray(statement.Action).some((action) =>
        ASSUME_ROLE_ACTIONS.has(action.toLowerCase()),
    );
}

function namesAwsPrincipal(
    statement: TrustPolicyStatement,
    principalArn: string,
): boolean {
    const principal = statement.Principal;
    if (principal === undefined || principal === "*") {
        return false;
    }
    return toArray(principal.AWS).includes(principalArn);
}

export interface TrustPolicyEditor {
    isCovered(document: TrustPolicyDocument, principalArn: string): boolean;
    grantAssumeRole(
        document: TrustPolicyDocument,
        principalArn: string,
    ): TrustPolicyDocument;
}

export function createTrustPolicyEditor(): TrustPolicyEditor {
    return {
        isCovered(
            document: TrustPolicyDocument,
            principalArn: string,
        ): boolean {
            return document.Statement.some(
                (statement) =>
                    statement.Effect === "Allow" &&
                    allowsAssumeRole(statement) &&
                    namesAwsPrincipal(statement, principalArn),
            );
        },

        grantAssumeRole(
            document: TrustPolicyDocument,
            principalArn: string,
        ): TrustPolicyDocument {
            const statement: TrustPolicyStatement = {
                Effect: "Allow",
                Principal: { AWS: [principalArn] },
                Action: ASSUME_ROLE_ACTION,
            };
            return {
                ...document,
                Statement: [...document.Statement, statement],
            };
        },
    };
}
