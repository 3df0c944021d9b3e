import { setTimeout as delay } from "node:timers/promises";
import { createConsola } from "consola";
import type { Credentials } from "./entities/aws-identity.js";
import { createAwsGateways } from "./gateways/aws-gateways.js";
import { createConfiguredAutoAssume } from "./use-cases/configure-auto-assume.js";
import { createSettingsParser } from "./use-cases/parse-settings.js";
import type { AutoAssumeSettingsInput } from "./use-cases/settings.schema.js";

export type { Credentials } from "./entities/aws-identity.js";
export * from "./entities/errors.js";
export type { AutoAssumeSettingsInput as AutoAssumeOptions } from "./use-cases/settings.schema.js";

/**
 * Adds the current identity to the trust policy of `roleName`, waits for the
 * change to propagate and returns temporary credentials for the role.
 *
 * Meant for testing policies from a workstation. The trust policy change is
 * permanent; nothing reverts it.
 *
 * @example
 * ```ts
 * const credentials = await autoAssume("policy-under-test");
 * const s3 = new S3Client({ credentials });
 * ```
 */
export async function autoAssume(
    roleName: string,
    options: AutoAssumeSettingsInput = {},
): Promise<Credentials> {
    const settings = createSettingsParser().parse(options);
    const reporter = createConsola({ stdout: process.stderr }).withTag(
        "iam-auto-assume",
    );
    const orchestrator = createConfiguredAutoAssume(
        settings,
        createAwsGateways(settings),
        {
            reporter: {
                info: (msg) => reporter.info(msg),
                warn: (msg) => reporter.warn(msg),
            },
            sleep: (ms) => delay(ms),
        },
    );
    return orchestrator.execute(roleName);
}
