export const describeError = (error: unknown): string => {
    if (error instanceof Error) {
        return error.message || error.name;
    }

    return String(error);
};

/**
 * Follows `error.cause` and returns one `Caused by: ...` line per cause.
 */
export const formatErrorChain = (error: unknown): string[] => {
    const lines: string[] = [];
    const seen = new Set<unknown>([error]);

    let cause = error instanceof Error ? error.cause : undefined;

    while (cause !== undefined && !seen.has(cause)) {
        lines.push(`Caused by: ${describeError(cause)}`);
        seen.add(cause);
        cause = cause instanceof Error ? cause.cause : undefined;
    }

    return lines;
};
