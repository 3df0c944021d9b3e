import { describe, expect, it } from "vitest";
import {
    AssumeRoleDeniedError,
    AssumeRoleRejectedError,
    AutoAssumeError,
    RoleNotFoundError,
} from "./errors.js";

describe("AutoAssumeError", () => {
    describe("given a subclass instance", () => {
        it("should carry the subclass name", () => {
            const error = new AssumeRoleDeniedError("explicit deny");

            expect(error.name).toBe("AssumeRoleDeniedError");
            expect(error).toBeInstanceOf(AutoAssumeError);
            expect(error).toBeInstanceOf(Error);
        });

        it("should keep the cause", () => {
            const cause = new Error("AccessDenied");
            const error = new AssumeRoleRejectedError("rejected", { cause });

            expect(error.cause).toBe(cause);
        });
    });

    describe("retryable", () => {
        it("should only be set on rejected assume-role errors", () => {
            expect(new AssumeRoleRejectedError("x").retryable).toBe(true);
            expect(new AssumeRoleDeniedError("x").retryable).toBe(false);
        });
    });

    describe("RoleNotFoundError", () => {
        it("should name the missing role", () => {
            const error = new RoleNotFoundError("tester");

            expect(error.message).toBe("Role tester does not exist");
            expect(error.roleName).toBe("tester");
        });
    });
});
