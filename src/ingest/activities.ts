// ── Activity Categories ─────────────────────────────────────────────
// Keyword table that maps free-text time-block activities onto a fixed
// set of categories. Loaded once at startup and passed to whoever
// classifies; never mutated afterwards.

import { readFile } from "node:fs/promises";
import { z } from "zod";

export const FALLBACK_CATEGORY = "Other";

const activityTableSchema = z.object({
  categories: z
    .array(
      z.object({
        name: z.string().min(1),
        color: z.string().default("gray"),
        keywords: z.array(z.string().min(1)).min(1),
      }),
    )
    .min(1),
});

export interface ActivityCategory {
  readonly name: string;
  readonly color: string;
  readonly keywords: readonly string[];
}

export type ActivityTable = readonly ActivityCategory[];

/** Validate raw JSON and freeze it into an ActivityTable. */
export function createActivityTable(raw: unknown): ActivityTable {
  const { categories } = activityTableSchema.parse(raw);
  return Object.freeze(
    categories.map((category) =>
      Object.freeze({
        name: category.name,
        color: category.color,
        keywords: Object.freeze([...category.keywords]),
      }),
    ),
  );
}

export async function loadActivityTable(path: string): Promise<ActivityTable> {
  const text = await readFile(path, "utf8");
  return createActivityTable(JSON.parse(text));
}

/**
 * First category (in table order) with a keyword contained in the
 * activity text, compared case-insensitively.
 */
export function classifyActivity(table: ActivityTable, activity: string): string {
  const text = activity.toLowerCase();
  for (const category of table) {
    if (category.keywords.some((keyword) => text.includes(keyword.toLowerCase()))) {
      return category.name;
    }
  }
  return FALLBACK_CATEGORY;
}
