import { describe, expect, it } from "vitest";
import { SettingsError } from "../entities/errors.js";
import { createSettingsParser } from "./parse-settings.js";

describe("ParseSettings", () => {
    describe("given no values", () => {
        it("should apply the defaults", () => {
            const parser = createSettingsParser();

            const result = parser.parse({});

            expect(result).toEqual({
                sessionName: "TestRoleSession",
                propagationDelayMs: 10000,
                maxAttempts: 5,
                initialBackoffMs: 2000,
                backoffMultiplier: 2,
                maxBackoffMs: 30000,
                requestTimeoutMs: 10000,
                format: "json",
                verify: false,
            });
        });
    });

    describe("given string values from the command line", () => {
        it("should coerce numbers", () => {
            const parser = createSettingsParser();

            const result = parser.parse({
                propagationDelayMs: "0",
                maxAttempts: "3",
                backoffMultiplier: "1.5",
                durationSeconds: "900",
            });

            expect(result.propagationDelayMs).toBe(0);
            expect(result.maxAttempts).toBe(3);
            expect(result.backoffMultiplier).toBe(1.5);
            expect(result.durationSeconds).toBe(900);
        });

        it("should treat empty strings as unset", () => {
            const parser = createSettingsParser();

            const result = parser.parse({ region: "", sessionName: "" });

            expect(result.region).toBeUndefined();
            expect(result.sessionName).toBe("TestRoleSession");
        });
    });

    describe("given invalid values", () => {
        it("should reject a session name with spaces", () => {
            const parser = createSettingsParser();

            expect(() => parser.parse({ sessionName: "my session" })).toThrow(
                SettingsError,
            );
        });

        it("should reject a duration below the STS minimum", () => {
            const parser = createSettingsParser();

            expect(() => parser.parse({ durationSeconds: "60" })).toThrow(
                /durationSeconds/,
            );
        });

        it("should reject zero attempts", () => {
            const parser = createSettingsParser();

            expect(() => parser.parse({ maxAttempts: 0 })).toThrow(
                /maxAttempts/,
            );
        });

        it("should reject an unknown output format", () => {
            const parser = createSettingsParser();

            expect(() => parser.parse({ format: "yaml" })).toThrow(
                SettingsError,
            );
        });

        it("should reject a malformed region", () => {
            const parser = createSettingsParser();

            expect(() => parser.parse({ region: "east" })).toThrow(/region/);
        });
    });
});
