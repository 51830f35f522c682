import type { z } from "zod";

/**
 * Flatten Zod issues into "path: message" strings
 * A root-level issue has no path prefix
 */
export function describeIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.map(String).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}
