import Chance from "chance";
import { describe, expect, it } from "vitest";
import { MalformedPolicyError } from "../entities/errors.js";
import { createTrustPolicyParser } from "./parse-trust-policy.js";

const chance = new Chance();

function buildTrustPolicy() {
    return {
        Version: "2012-10-17",
        Statement: [
            {
                Sid: "AllowLambda",
                Effect: "Allow",
                Principal: { Service: "lambda.amazonaws.com" },
                Action: "sts:AssumeRole",
            },
        ],
    };
}

describe("ParseTrustPolicy", () => {
    describe("given a URL-encoded document as IAM returns it", () => {
        it("should decode and parse it", () => {
            const parser = createTrustPolicyParser();
            const encoded = encodeURIComponent(
                JSON.stringify(buildTrustPolicy()),
            );

            const result = parser.parse(encoded);

            expect(result.Version).toBe("2012-10-17");
            expect(result.Statement).toHaveLength(1);
            expect(result.Statement[0]?.Sid).toBe("AllowLambda");
        });
    });

    describe("given a plain JSON document", () => {
        it("should parse it without decoding", () => {
            const parser = createTrustPolicyParser();
            const policy = buildTrustPolicy();
            const condition = {
                StringEquals: { "sts:ExternalId": chance.guid() },
            };
            const json = JSON.stringify({
                ...policy,
                Statement: [{ ...policy.Statement[0], Condition: condition }],
            });

            const result = parser.parse(json);

            expect(result.Statement[0]?.Condition).toEqual(condition);
        });
    });

    describe("given a document with unknown fields", () => {
        it("should preserve them", () => {
            const parser = createTrustPolicyParser();
            const json = JSON.stringify({
                ...buildTrustPolicy(),
                Id: "trust",
                Custom: { keep: true },
            });

            const result = parser.parse(json);

            expect(result.Id).toBe("trust");
            expect(result.Custom).toEqual({ keep: true });
        });
    });

    describe("given a single statement object", () => {
        it("should normalize it to a one-element array", () => {
            const parser = createTrustPolicyParser();
            const policy = buildTrustPolicy();
            const json = JSON.stringify({
                Version: policy.Version,
                Statement: policy.Statement[0],
            });

            const result = parser.parse(json);

            expect(result.Statement).toEqual(policy.Statement);
        });
    });

    describe("given JSON with prototype pollution keys", () => {
        it("should strip __proto__ keys", () => {
            const parser = createTrustPolicyParser();
            const json =
                '{"Version":"2012-10-17","__proto__":{"polluted":true},"Statement":[]}';

            const result = parser.parse(json);

            expect(Object.keys(result)).toEqual(["Version", "Statement"]);
            expect(result.polluted).toBeUndefined();
        });
    });

    describe("given invalid content", () => {
        it("should throw MalformedPolicyError on broken JSON", () => {
            const parser = createTrustPolicyParser();

            expect(() => parser.parse("{not valid")).toThrow(
                MalformedPolicyError,
            );
        });

        it("should throw MalformedPolicyError on a broken URL encoding", () => {
            const parser = createTrustPolicyParser();

            expect(() => parser.parse("%E0%A4%A")).toThrow(
                MalformedPolicyError,
            );
        });

        it("should throw MalformedPolicyError when Statement is missing", () => {
            const parser = createTrustPolicyParser();

            expect(() => parser.parse('{"Version":"2012-10-17"}')).toThrow(
                /Statement/,
            );
        });

        it("should throw MalformedPolicyError on an unknown effect", () => {
            const parser = createTrustPolicyParser();
            const json = JSON.stringify({
                Statement: [{ Effect: "Maybe", Action: "sts:AssumeRole" }],
            });

            expect(() => parser.parse(json)).toThrow(MalformedPolicyError);
        });
    });
});
