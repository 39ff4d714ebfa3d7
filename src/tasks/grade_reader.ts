import { z } from "zod";

import { Confidence } from "../contracts/case";
import type { AnalysisTaskDefinition } from "../pipeline/task";
import { DOCUMENT_EXTRACTION } from "./document_extraction";
import { completeWithModel, inputPayload, readNumber, sectionText, type TaskDeps } from "./task_support";

export const GRADE_READER = "grade_reader";

export const AcademicStrength = z.enum(["exceptional", "strong", "solid", "developing", "unknown"]);

export const GradeReading = z.object({
  gpa: z.number().min(0).max(5).nullable(),
  courseCount: z.number().int().nonnegative(),
  apCount: z.number().int().nonnegative(),
  honorsCount: z.number().int().nonnegative(),
  ibCount: z.number().int().nonnegative(),
  academicStrength: AcademicStrength,
  notablePatterns: z.array(z.string()),
  confidence: Confidence.optional(),
});

export type GradeReading = z.infer<typeof GradeReading>;

// Course lines end in a letter grade, e.g. "AP Biology  A-".
const GRADE_LINE = /\s[A-F][+-]?$/;

const countMatches = (lines: string[], pattern: RegExp) =>
  lines.filter((line) => pattern.test(line)).length;

export function strengthFromGpa(gpa: number | null): z.infer<typeof AcademicStrength> {
  if (gpa === null) return "unknown";
  if (gpa >= 3.8) return "exceptional";
  if (gpa >= 3.4) return "strong";
  if (gpa >= 2.8) return "solid";
  return "developing";
}

export function draftGradeReading(transcript: string, extractedGpa: number | null): GradeReading {
  const lines = transcript
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
  const courseLines = lines.filter((line) => GRADE_LINE.test(line) && !/\bGPA\b/i.test(line));
  const apCount = countMatches(courseLines, /\bAP\b/);
  const honorsCount = countMatches(courseLines, /\bHonors\b/i);
  const ibCount = countMatches(courseLines, /\bIB\b/);
  const lowGrades = countMatches(courseLines, /\s[DF][+-]?$/);

  const notablePatterns: string[] = [];
  if (apCount + honorsCount + ibCount >= 5) notablePatterns.push("rigorous course load");
  if (courseLines.length > 0 && lowGrades === 0) notablePatterns.push("no grades below C");
  if (lowGrades > 0) notablePatterns.push(`${lowGrades} course(s) with D or F`);

  return {
    gpa: extractedGpa,
    courseCount: courseLines.length,
    apCount,
    honorsCount,
    ibCount,
    academicStrength: strengthFromGpa(extractedGpa),
    notablePatterns,
    confidence: extractedGpa !== null && courseLines.length >= 4 ? "high" : extractedGpa !== null ? "medium" : "low",
  };
}

export function gradeReaderTask(deps: TaskDeps): AnalysisTaskDefinition {
  return {
    name: GRADE_READER,
    kind: "analysis",
    description: "Reads transcript grades and course rigor",
    requires: [DOCUMENT_EXTRACTION],
    prefers: [],
    required: true,
    run: async (ctx) => {
      const extraction = inputPayload(ctx, DOCUMENT_EXTRACTION);
      const transcript = sectionText(extraction, "transcript");
      const draft = draftGradeReading(transcript, readNumber(extraction, "gpa"));

      const reading = await completeWithModel({
        deps,
        ctx,
        taskName: GRADE_READER,
        instructions:
          "You read high school transcripts. Return JSON with keys gpa, courseCount, apCount, honorsCount, ibCount, academicStrength, notablePatterns, confidence.",
        sections: [
          { id: "rules", title: "Task", content: "Assess GPA, course rigor and grade trends." },
          { id: "transcript", title: "Transcript", content: transcript || "(none)" },
        ],
        draft,
        schema: GradeReading,
      });

      const { confidence, ...payload } = reading;
      return { payload, confidence: confidence ?? draft.confidence ?? "medium" };
    },
  };
}
