import { APPLICATION_READER } from "./application_reader";
import { GRADE_READER } from "./grade_reader";
import { RECOMMENDATION_READER } from "./recommendation_reader";
import { SCHOOL_ENRICHMENT } from "./school_enrichment";

export type TaskReadiness = {
  taskName: string;
  needs: string;
  status: "ready" | "missing_info";
  missing: string[];
  dataSource: "already_processed" | "source_text" | null;
};

export type ReadinessReport = {
  tasks: TaskReadiness[];
  readyCount: number;
  totalCount: number;
  percentage: number;
  overallStatus: "ready" | "partial" | "not_ready";
  missingInformation: string[];
  canProceed: boolean;
  recommendation: string;
};

const MISSING_TRANSCRIPT = "Transcript with courses and grades";
const MISSING_LETTERS = "Teacher or counselor recommendation letters";
const MISSING_ESSAY = "Application essay or personal statement";
const MISSING_SCHOOL = "School name and location (usually the transcript header)";

const includesAny = (text: string, keywords: string[]) => keywords.some((k) => text.includes(k));

function uploadRecommendation(missing: string[]): string {
  if (missing.length === 0) return "All required information is available.";
  if (missing.includes(MISSING_TRANSCRIPT)) {
    return "Upload the transcript next; it covers grades and identifies the school.";
  }
  if (missing.includes(MISSING_LETTERS)) return "Upload recommendation letters next.";
  if (missing.includes(MISSING_ESSAY)) return "Upload the application essay or personal statement next.";
  return `Upload missing documents: ${missing.slice(0, 2).join(", ")}`;
}

/**
 * Checks the text for the material each analysis needs. Tasks named in
 * `processed` already have a durable result and count as ready.
 */
export function assessReadiness(sourceText: string, processed: ReadonlySet<string> = new Set()): ReadinessReport {
  const lower = sourceText.toLowerCase();
  const hasEssay = includesAny(lower, ["essay", "personal statement"]) || sourceText.length > 500;
  const hasGrades = includesAny(lower, ["gpa", "grade", "transcript", "course"]);
  const hasSchool = includesAny(lower, ["high school", "school name", "school district"]);
  const hasLetters = includesAny(lower, ["recommendation", "recommender", "letter of", "reference"]);

  const check = (taskName: string, needs: string, present: boolean, missingItem: string): TaskReadiness => {
    const done = processed.has(taskName);
    const ready = done || present;
    return {
      taskName,
      needs,
      status: ready ? "ready" : "missing_info",
      missing: ready ? [] : [missingItem],
      dataSource: done ? "already_processed" : present ? "source_text" : null,
    };
  };

  const tasks = [
    check(APPLICATION_READER, "application essay or personal statement", hasEssay, MISSING_ESSAY),
    check(GRADE_READER, "transcript with grades and GPA", hasGrades, MISSING_TRANSCRIPT),
    check(RECOMMENDATION_READER, "recommendation letters", hasLetters, MISSING_LETTERS),
    check(SCHOOL_ENRICHMENT, "school name and location", hasSchool || hasGrades, MISSING_SCHOOL),
  ];

  const readyCount = tasks.filter((t) => t.status === "ready").length;
  const totalCount = tasks.length;
  const missingInformation = Array.from(new Set(tasks.flatMap((t) => t.missing)));

  return {
    tasks,
    readyCount,
    totalCount,
    percentage: Math.floor((readyCount / totalCount) * 100),
    overallStatus: readyCount === totalCount ? "ready" : readyCount > 0 ? "partial" : "not_ready",
    missingInformation,
    canProceed: readyCount >= 2,
    recommendation: uploadRecommendation(missingInformation),
  };
}
