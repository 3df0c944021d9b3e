const ACCESS_DENIED_CODES = new Set([
    "AccessDenied",
    "AccessDeniedException",
    "UnauthorizedOperation",
]);

export function isAccessDenied(error: unknown): error is Error {
    return error instanceof Error && ACCESS_DENIED_CODES.has(error.name);
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return `${error.name}: ${error.message}`;
    }
    return String(error);
}
