import { z } from "zod";

const PolicyValueSchema = z.union([z.string(), z.array(z.string())]);

const PrincipalSchema = z.union([
    z.literal("*"),
    z
        .object({
            AWS: PolicyValueSchema.optional(),
            Service: PolicyValueSchema.optional(),
            Federated: PolicyValueSchema.optional(),
            CanonicalUser: PolicyValueSchema.optional(),
        })
        .passthrough(),
]);

const TrustPolicyStatementSchema = z
    .object({
        Sid: z.string().optional(),
        Effect: z.enum(["Allow", "Deny"]),
        Principal: PrincipalSchema.optional(),
        NotPrincipal: PrincipalSchema.optional(),
        Action: PolicyValueSchema.optional(),
        NotAction: PolicyValueSchema.optional(),
        Condition: z.record(z.string(), z.unknown()).optional(),
    })
    .passthrough();

export const TrustPolicyDocumentSchema = z
    .object({
        Version: z.string().optional(),
        Id: z.string().optional(),
        Statement: z.union([
            z.array(TrustPolicyStatementSchema),
            TrustPolicyStatementSchema.transform((statement) => [statement]),
        ]),
    })
    .passthrough();
