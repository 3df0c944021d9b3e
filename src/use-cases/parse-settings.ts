import { SettingsError } from "../entities/errors.js";
import {
    type AutoAssumeSettings,
    AutoAssumeSettingsSchema,
} from "./settings.schema.js";

export interface SettingsParser {
    parse(raw: Readonly<Record<string, unknown>>): AutoAssumeSettings;
}

function dropEmpty(
    raw: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
        if (value === undefined || value === "") {
            continue;
        }
        result[key] = value;
    }
    return result;
}

export function createSettingsParser(): SettingsParser {
    return {
        parse(raw: Readonly<Record<string, unknown>>): AutoAssumeSettings {
            const result = AutoAssumeSettingsSchema.safeParse(dropEmpty(raw));
            if (!result.success) {
                const details = result.error.issues
                    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                    .join("; ");
                throw new SettingsError(`Invalid settings: ${details}`, {
                    cause: result.error,
                });
            }
            return result.data;
        },
    };
}
