export type PolicyValue = string | readonly string[];

export type StatementPrincipal =
    | "*"
    | {
          readonly AWS?: PolicyValue;
          readonly Service?: PolicyValue;
          readonly Federated?: PolicyValue;
          readonly CanonicalUser?: PolicyValue;
      };

export interface TrustPolicyStatement {
    readonly Sid?: string;
    readonly Effect: "Allow" | "Deny";
    readonly Principal?: StatementPrincipal;
    readonly NotPrincipal?: StatementPrincipal;
    readonly Action?: PolicyValue;
    readonly NotAction?: PolicyValue;
    readonly Condition?: Readonly<Record<string, unknown>>;
    readonly [field: string]: unknown;
}

export interface TrustPolicyDocument {
    readonly Version?: string;
    readonly Id?: string;
    readonly Statement: readonly TrustPolicyStatement[];
    readonly [field: string]: unknown;
}

export const ASSUME_ROLE_ACTION = "sts:AssumeRole";
