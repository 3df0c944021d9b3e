import { defineCommand } from "citty";
import { consola, createConsola } from "consola";
import type { Credentials } from "../entities/aws-identity.js";
import {
    type AutoAssumeGateways,
    type AutoAssumeRuntime,
    createConfiguredAutoAssume,
} from "../use-cases/configure-auto-assume.js";
import type { CredentialsFormatter } from "../use-cases/format-credentials.js";
import type { SettingsParser } from "../use-cases/parse-settings.js";
import type { AutoAssumeSettings } from "../use-cases/settings.schema.js";

export interface AssumeConsoleOutput {
    log(message: string): void;
    info(message: string): void;
    warn(message: string): void;
}

export interface AssumeCommandDeps {
    readonly settingsParser: SettingsParser;
    readonly formatter: CredentialsFormatter;
    readonly gatewaysFor: (settings: AutoAssumeSettings) => AutoAssumeGateways;
    readonly sleep: AutoAssumeRuntime["sleep"];
}

export interface AssumeCommand {
    execute(
        roleName: string,
        rawSettings: Readonly<Record<string, unknown>>,
        console: AssumeConsoleOutput,
    ): Promise<Credentials>;
}

export function createAssumeCommand(deps: AssumeCommandDeps): AssumeCommand {
    return {
        async execute(
            roleName: string,
            rawSettings: Readonly<Record<string, unknown>>,
            output: AssumeConsoleOutput,
        ): Promise<Credentials> {
            const settings = deps.settingsParser.parse(rawSettings);
            const orchestrator = createConfiguredAutoAssume(
                settings,
                deps.gatewaysFor(settings),
                {
                    reporter: {
                        info: (msg) => output.info(msg),
                        warn: (msg) => output.warn(msg),
                    },
                    sleep: deps.sleep,
                },
            );

            const credentials = await orchestrator.execute(roleName);
            output.log(deps.formatter.format(credentials, settings.format));

            return credentials;
        },
    };
}

export function createAssumeCittyCommand(deps: AssumeCommandDeps) {
    const assumeCommand = createAssumeCommand(deps);
    // Progress goes to stderr so that `eval "$(iam-auto-assume ...)"` works.
    const progress = createConsola({ stdout: process.stderr });

    return defineCommand({
        meta: {
            name: "iam-auto-assume",
            description:
                "Add the current identity to a role's trust policy, then assume the role and print temporary credentials. For testing only: the trust policy change is not reverted.",
        },
        args: {
            role: {
                type: "positional",
                description: "Name of the IAM role to assume",
                required: true,
            },
            region: {
                type: "string",
                description: "AWS region for STS calls",
            },
            profile: {
                type: "string",
                description: "Shared config profile for the calling identity",
            },
            "session-name": {
                type: "string",
                description: "Role session name (default TestRoleSession)",
            },
            "duration-seconds": {
                type: "string",
                description: "Requested credential lifetime, 900-43200",
            },
            "propagation-delay-ms": {
                type: "string",
                description:
                    "Wait after a trust policy update before assuming (default 10000)",
            },
            "max-attempts": {
                type: "string",
                description: "Assume-role attempts before giving up (default 5)",
            },
            "initial-backoff-ms": {
                type: "string",
                description: "Delay before the first retry (default 2000)",
            },
            "backoff-multiplier": {
                type: "string",
                description: "Growth factor between retries (default 2)",
            },
            "max-backoff-ms": {
                type: "string",
                description: "Upper bound of a single retry delay (default 30000)",
            },
            "request-timeout-ms": {
                type: "string",
                description: "Timeout of each AWS request (default 10000)",
            },
            format: {
                type: "string",
                description: "Output format: json or env",
            },
            verify: {
                type: "boolean",
                description:
                    "Check that the issued credentials act as the target role",
                default: false,
            },
        },
        async run({ args }) {
            await assumeCommand.execute(
                args.role,
                {
                    region: args.region,
                    profile: args.profile,
                    sessionName: args["session-name"],
                    durationSeconds: args["duration-seconds"],
                    propagationDelayMs: args["propagation-delay-ms"],
                    maxAttempts: args["max-attempts"],
                    initialBackoffMs: args["initial-backoff-ms"],
                    backoffMultiplier: args["backoff-multiplier"],
                    maxBackoffMs: args["max-backoff-ms"],
                    requestTimeoutMs: args["request-timeout-ms"],
                    format: args.format,
                    verify: args.verify,
                },
                {
                    log: (msg) => consola.log(msg),
                    info: (msg) => progress.info(msg),
                    warn: (msg) => progress.warn(msg),
                },
            );
        },
    });
}
