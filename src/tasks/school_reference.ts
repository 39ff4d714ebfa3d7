import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";

import { schoolKey } from "./school_names";

const SchoolEntry = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string()).default([]),
  city: z.string(),
  state: z.string().regex(/^[A-Z]{2}$/),
  baseOpportunityScore: z.number().min(0).max(100),
  apCourses: z.number().int().nonnegative(),
  honorsCourses: z.number().int().nonnegative(),
  advancedCourses: z.number().int().nonnegative(),
  programs: z.array(z.string()).default([]),
});

export type SchoolEntry = z.infer<typeof SchoolEntry>;

const ReferenceFile = z.object({
  version: z.number(),
  schools: z.array(SchoolEntry),
});

export const DEFAULT_SCHOOL_REFERENCE_PATH = resolve(__dirname, "../../data/school_reference.json");

export class SchoolReference {
  private byKey = new Map<string, SchoolEntry>();

  constructor(entries: SchoolEntry[]) {
    for (const entry of entries) {
      this.byKey.set(schoolKey(entry.name), entry);
      for (const alias of entry.aliases) this.byKey.set(schoolKey(alias), entry);
    }
  }

  static load(path: string = DEFAULT_SCHOOL_REFERENCE_PATH): SchoolReference {
    const parsed = ReferenceFile.parse(JSON.parse(readFileSync(path, "utf8")));
    return new SchoolReference(parsed.schools);
  }

  lookup(name: string | null | undefined): SchoolEntry | null {
    if (!name) return null;
    return this.byKey.get(schoolKey(name)) ?? null;
  }

  get size(): number {
    return new Set(this.byKey.values()).size;
  }
}

/** Base score plus bonuses for advanced coursework on offer, capped at 100. */
export function opportunityScore(entry: Pick<
  SchoolEntry,
  "baseOpportunityScore" | "apCourses" | "honorsCourses" | "advancedCourses"
>): number {
  let score = entry.baseOpportunityScore;
  if (entry.apCourses > 0) score += 10;
  if (entry.honorsCourses > 0) score += 5;
  if (entry.advancedCourses > 5) score += 10;
  return Math.min(100, score);
}
