import { z } from "zod";

const SESSION_NAME_REGEX = /^[\w+=,.@-]{2,64}$/;
const AWS_REGION_REGEX = /^[a-z]{2}(-[a-z]+)+-\d+$/;

export const OUTPUT_FORMATS = ["json", "env"] as const;

export const AutoAssumeSettingsSchema = z.object({
    region: z
        .string()
        .regex(
            AWS_REGION_REGEX,
            "region must be a valid AWS region identifier (e.g. us-east-1)",
        )
        .optional(),
    profile: z.string().min(1, "profile must not be empty").optional(),
    sessionName: z
        .string()
        .regex(
            SESSION_NAME_REGEX,
            "session_name must be 2-64 characters of letters, digits and +=,.@_-",
        )
        .default("TestRoleSession"),
    durationSeconds: z.coerce.number().int().min(900).max(43200).optional(),
    propagationDelayMs: z.coerce.number().int().min(0).default(10_000),
    maxAttempts: z.coerce.number().int().min(1).max(20).default(5),
    initialBackoffMs: z.coerce.number().int().min(0).default(2_000),
    backoffMultiplier: z.coerce.number().min(1).default(2),
    maxBackoffMs: z.coerce.number().int().min(0).default(30_000),
    requestTimeoutMs: z.coerce.number().int().positive().default(10_000),
    format: z.enum(OUTPUT_FORMATS).default("json"),
    verify: z.boolean().default(false),
});

export type AutoAssumeSettings = z.infer<typeof AutoAssumeSettingsSchema>;
export type AutoAssumeSettingsInput = z.input<typeof AutoAssumeSettingsSchema>;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
