import { z } from "zod";

import { Confidence } from "../contracts/case";
import type { AnalysisTaskDefinition, RemediationRequest } from "../pipeline/task";
import { DOCUMENT_EXTRACTION } from "./document_extraction";
import { opportunityScore, type SchoolEntry } from "./school_reference";
import {
  completeWithModel,
  inputPayload,
  readNumber,
  readString,
  readStringList,
  type TaskDeps,
} from "./task_support";

export const SCHOOL_ENRICHMENT = "school_enrichment";

// Used only when remediation asks for a score and the school is not in the reference table.
export const NEUTRAL_OPPORTUNITY_SCORE = 50;

export const SchoolEnrichment = z.object({
  schoolName: z.string().nullable(),
  city: z.string().nullable(),
  stateCode: z.string().nullable(),
  opportunityScore: z.number().nullable(),
  apCoursesAvailable: z.number().int().nonnegative().nullable(),
  programs: z.array(z.string()),
  dataSources: z.array(z.string()),
  analysisSummary: z.string(),
  confidence: Confidence.optional(),
});

export type SchoolEnrichment = z.infer<typeof SchoolEnrichment>;

function summarize(e: Pick<SchoolEnrichment, "schoolName" | "stateCode" | "opportunityScore" | "programs">) {
  if (!e.schoolName) return "School could not be identified from the submission.";
  const where = e.stateCode ? ` (${e.stateCode})` : "";
  const score = e.opportunityScore !== null ? `opportunity score ${e.opportunityScore}` : "no opportunity score";
  const programs = e.programs.length > 0 ? `; programs: ${e.programs.join(", ")}` : "";
  return `${e.schoolName}${where}: ${score}${programs}.`;
}

export function draftSchoolEnrichment(args: {
  extractedName: string | null;
  extractedCity: string | null;
  extractedState: string | null;
  reference: SchoolEntry | null;
}): SchoolEnrichment {
  const { reference } = args;
  const dataSources = ["source_text"];
  if (reference) dataSources.push("school_reference");

  const draft = {
    schoolName: reference?.name ?? args.extractedName,
    city: args.extractedCity ?? reference?.city ?? null,
    stateCode: args.extractedState ?? reference?.state ?? null,
    opportunityScore: reference ? opportunityScore(reference) : null,
    apCoursesAvailable: reference?.apCourses ?? null,
    programs: reference?.programs ?? [],
    dataSources,
  };
  const confidence: Confidence = reference ? "high" : args.extractedName ? "medium" : "low";
  return { ...draft, analysisSummary: summarize(draft), confidence };
}

/** Fills the fields a rejected output was missing, where a fallback exists. */
export function applyRemediation(
  draft: SchoolEnrichment,
  remediation: RemediationRequest,
  extractedName: string | null
): SchoolEnrichment {
  const next = { ...draft, dataSources: [...draft.dataSources] };
  const missing = new Set(remediation.hint.missingFields);
  const mismatch = remediation.hint.inconsistencies.some((item) => item.startsWith("schoolName"));

  if ((missing.has("schoolName") || mismatch) && extractedName) {
    next.schoolName = extractedName;
  }
  const previousScore = readNumber(remediation.previousOutput, "opportunityScore");
  if (next.opportunityScore === null && previousScore !== null) {
    // An earlier attempt already settled the score.
    next.opportunityScore = previousScore;
    next.dataSources = readStringList(remediation.previousOutput, "dataSources");
    next.confidence = "low";
  } else if (missing.has("opportunityScore") && next.opportunityScore === null && next.schoolName) {
    next.opportunityScore = NEUTRAL_OPPORTUNITY_SCORE;
    next.dataSources.push("neutral_estimate");
    next.confidence = "low";
  }
  next.analysisSummary = summarize(next);
  return next;
}

export function schoolEnrichmentTask(deps: TaskDeps): AnalysisTaskDefinition {
  return {
    name: SCHOOL_ENRICHMENT,
    kind: "analysis",
    description: "Identifies the applicant's school and its opportunity profile",
    requires: [DOCUMENT_EXTRACTION],
    prefers: [],
    required: true,
    run: async (ctx) => {
      const extraction = inputPayload(ctx, DOCUMENT_EXTRACTION);
      const extractedName = readString(extraction, "schoolName");
      let draft = draftSchoolEnrichment({
        extractedName,
        extractedCity: readString(extraction, "city"),
        extractedState: readString(extraction, "stateCode"),
        reference: deps.schools.lookup(extractedName),
      });
      if (ctx.remediation) {
        draft = applyRemediation(draft, ctx.remediation, extractedName);
      }

      const enrichment = await completeWithModel({
        deps,
        ctx,
        taskName: SCHOOL_ENRICHMENT,
        instructions:
          "You profile high schools. Return JSON with keys schoolName, city, stateCode (two letters), opportunityScore (0-100), apCoursesAvailable, programs, dataSources, analysisSummary, confidence.",
        sections: [
          {
            id: "rules",
            title: "Task",
            content: "Identify the school and describe the academic opportunities it offers.",
          },
          {
            id: "school",
            title: "School as written in the submission",
            content: extractedName ?? "(not found)",
          },
        ],
        draft,
        schema: SchoolEnrichment,
      });

      const { confidence, ...payload } = enrichment;
      return { payload, confidence: confidence ?? draft.confidence ?? "medium" };
    },
  };
}
