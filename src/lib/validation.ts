import type { z } from "zod";

/**
 * Compact, single-line rendering of the first few issues of a zod error.
 */
export function formatIssues(error: z.ZodError, max = 5): string {
	return error.issues
		.slice(0, max)
		.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
		.join("; ");
}
