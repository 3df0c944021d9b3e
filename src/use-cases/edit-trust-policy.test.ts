import Chance from "chance";
import { describe, expect, it } from "vitest";
import type { TrustPolicyDocument } from "../entities/trust-policy.js";
import { createTrustPolicyEditor } from "./edit-trust-policy.js";

const chance = new Chance();

function buildCallerArn() {
    return `arn:aws:iam::123456789012:user/${chance.word()}`;
}

function buildDocument(
    statements: TrustPolicyDocument["Statement"],
): TrustPolicyDocument {
    return { Version: "2012-10-17", Statement: statements };
}

describe("TrustPolicyEditor", () => {
    describe("isCovered", () => {
        it("should detect a statement naming the caller in a principal list", () => {
            // Arrange
            const editor = createTrustPolicyEditor();
            const callerArn = buildCallerArn();
            const document = buildDocument([
                {
                    Effect: "Allow",
                    Principal: { AWS: ["arn:aws:iam::1:root", callerArn] },
                    Action: "sts:AssumeRole",
                },
            ]);

            // Act
            const result = editor.isCovered(document, callerArn);

            // Assert
            expect(result).toBe(true);
        });

        it("should accept a single principal string and an action list", () => {
            const editor = createTrustPolicyEditor();
            const callerArn = buildCallerArn();
            const document = buildDocument([
                {
                    Effect: "Allow",
                    Principal: { AWS: callerArn },
                    Action: ["sts:TagSession", "STS:AssumeRole"],
                },
            ]);

            expect(editor.isCovered(document, callerArn)).toBe(true);
        });

        it("should accept sts wildcards", () => {
            const editor = createTrustPolicyEditor();
            const callerArn = buildCallerArn();

            for (const action of ["sts:*", "*"]) {
                const document = buildDocument([
                    { Effect: "Allow", Principal: { AWS: callerArn }, Action: action },
                ]);
                expect(editor.isCovered(document, callerArn)).toBe(true);
            }
        });

        it("should ignore deny statements", () => {
            const editor = createTrustPolicyEditor();
            const callerArn = buildCallerArn();
            const document = buildDocument([
                {
                    Effect: "Deny",
                    Principal: { AWS: callerArn },
                    Action: "sts:AssumeRole",
                },
            ]);

            expect(editor.isCovered(document, callerArn)).toBe(false);
        });

        it("should ignore statements for other actions", () => {
            const editor = createTrustPolicyEditor();
            const callerArn = buildCallerArn();
            const document = buildDocument([
                {
                    Effect: "Allow",
                    Principal: { AWS: callerArn },
                    Action: "sts:AssumeRoleWithWebIdentity",
                },
            ]);

            expect(editor.isCovered(document, callerArn)).toBe(false);
        });

        it("should ignore service and wildcard principals", () => {
            const editor = createTrustPolicyEditor();
            const callerArn = buildCallerArn();
            const document = buildDocument([
                { Effect: "Allow", Principal: "*", Action: "sts:AssumeRole" },
                {
                    Effect: "Allow",
                    Principal: { Service: callerArn },
                    Action: "sts:AssumeRole",
                },
            ]);

            expect(editor.isCovered(document, callerArn)).toBe(false);
        });
    });

    describe("grantAssumeRole", () => {
        it("should append one statement after the existing ones", () => {
            // Arrange
            const editor = createTrustPolicyEditor();
            const callerArn = buildCallerArn();
            const existing = {
                Sid: "AllowEc2",
                Effect: "Allow",
                Principal: { Service: "ec2.amazonaws.com" },
                Action: "sts:AssumeRole",
            } as const;
            const document = buildDocument([existing]);

            // Act
            const result = editor.grantAssumeRole(document, callerArn);

            // Assert
            expect(result.Version).toBe("2012-10-17");
            expect(result.Statement).toEqual([
                existing,
                {
                    Effect: "Allow",
                    Principal: { AWS: [callerArn] },
                    Action: "sts:AssumeRole",
                },
            ]);
        });

        it("should leave the input document untouched", () => {
            const editor = createTrustPolicyEditor();
            const document = buildDocument([]);

            editor.grantAssumeRole(document, buildCallerArn());

            expect(document.Statement).toHaveLength(0);
        });

        it("should make the caller covered", () => {
            const editor = createTrustPolicyEditor();
            const callerArn = buildCallerArn();

            const result = editor.grantAssumeRole(buildDocument([]), callerArn);

            expect(editor.isCovered(result, callerArn)).toBe(true);
        });
    });
});
