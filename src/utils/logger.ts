import type { InvocationContext } from "@azure/functions";

/** The slice of the function invocation context that services log through. */
export type Logger = Pick<InvocationContext, "log" | "warn" | "error">;

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
