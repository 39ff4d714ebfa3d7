import type { Confidence, JsonObject } from "../contracts/case";
import { TaskOutputError } from "../pipeline/errors";
import type { AnalysisTaskDefinition } from "../pipeline/task";
import { extractLocation, extractSchoolName } from "./school_names";

export const DOCUMENT_EXTRACTION = "document_extraction";

export type DocumentCategory = "application" | "transcript" | "recommendation";

const CATEGORY_KEYWORDS: Record<DocumentCategory, string[]> = {
  transcript: [
    "transcript",
    "gpa",
    "credits",
    "semester",
    "course",
    "grade",
    "honors",
    "ap ",
    "ib ",
    "class rank",
  ],
  recommendation: [
    "recommendation",
    "to whom it may concern",
    "i recommend",
    "reference",
    "counselor",
    "teacher",
    "principal",
  ],
  application: [
    "application",
    "personal statement",
    "essay",
    "activities",
    "awards",
    "leadership",
    "goals",
    "why",
    "motivation",
  ],
};

const CATEGORIES: DocumentCategory[] = ["application", "transcript", "recommendation"];

export function scoreCategories(text: string): Record<DocumentCategory, number> {
  const lower = text.toLowerCase();
  const scores: Record<DocumentCategory, number> = { application: 0, transcript: 0, recommendation: 0 };
  for (const category of CATEGORIES) {
    scores[category] = CATEGORY_KEYWORDS[category].filter((keyword) => lower.includes(keyword)).length;
  }
  return scores;
}

/** Highest keyword score wins; ties and empty blocks fall back to application. */
export function classifyBlock(text: string): DocumentCategory {
  const scores = scoreCategories(text);
  let best: DocumentCategory = "application";
  for (const category of CATEGORIES) {
    if (scores[category] > scores[best]) best = category;
  }
  return best;
}

export function splitSections(text: string): Record<DocumentCategory, string> {
  const sections: Record<DocumentCategory, string[]> = { application: [], transcript: [], recommendation: [] };
  const blocks = text
    .split(/\n\s*\n/)
    .map((block) => block.trim())
    .filter(Boolean);
  for (const block of blocks) {
    sections[classifyBlock(block)].push(block);
  }
  return {
    application: sections.application.join("\n\n"),
    transcript: sections.transcript.join("\n\n"),
    recommendation: sections.recommendation.join("\n\n"),
  };
}

export function extractApplicantName(text: string): string | null {
  const match = text.match(
    /^\s*(?:(?:[Ss]tudent|[Aa]pplicant|[Ff]ull) )?[Nn]ame\s*:\s*([A-Z][A-Za-z'-]+(?: [A-Z][A-Za-z'-]+){0,3})/m
  );
  return match ? match[1].trim() : null;
}

export function extractGpa(text: string): number | null {
  const match = text.match(/\bGPA\b[^0-9\n]{0,20}(\d(?:\.\d{1,2})?)/i);
  if (!match) return null;
  const gpa = Number(match[1]);
  return gpa >= 0 && gpa <= 5 ? gpa : null;
}

/**
 * Stage 1: canonicalizes the raw submission into the fields and document
 * sections every later task reads.
 */
export function extractDocuments(sourceText: string): { payload: JsonObject; confidence: Confidence } {
  const text = sourceText.replace(/\r\n/g, "\n");
  const sections = splitSections(text);
  const schoolName = extractSchoolName(text);
  const location = extractLocation(text);
  const applicantName = extractApplicantName(text);
  const documentTypes = CATEGORIES.filter((category) => sections[category].length > 0);

  const found = [schoolName, applicantName, location].filter(Boolean).length;
  const confidence: Confidence = found === 3 ? "high" : found >= 1 ? "medium" : "low";

  return {
    payload: {
      applicantName,
      schoolName,
      city: location?.city ?? null,
      stateCode: location?.stateCode ?? null,
      gpa: extractGpa(sections.transcript || text),
      documentTypes,
      sections,
      sourceChars: text.length,
    },
    confidence,
  };
}

export function documentExtractionTask(): AnalysisTaskDefinition {
  return {
    name: DOCUMENT_EXTRACTION,
    kind: "analysis",
    description: "Canonicalizes the submission into applicant, school and document sections",
    requires: [],
    prefers: [],
    required: true,
    retries: 0,
    run: async (ctx) => {
      if (ctx.sourceText.trim().length === 0) {
        throw new TaskOutputError(DOCUMENT_EXTRACTION, ["source text is empty"]);
      }
      return extractDocuments(ctx.sourceText);
    },
  };
}
