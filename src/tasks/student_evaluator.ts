import { z } from "zod";

import { Confidence, UNKNOWN_INPUT, type JsonObject } from "../contracts/case";
import type { AnalysisTaskDefinition, TaskContext } from "../pipeline/task";
import { APPLICATION_READER } from "./application_reader";
import { GRADE_READER } from "./grade_reader";
import { RECOMMENDATION_READER } from "./recommendation_reader";
import { SCHOOL_CONTEXT } from "./school_context";
import { SCHOOL_ENRICHMENT } from "./school_enrichment";
import { completeWithModel, inputPayload, readNumber, readString, type TaskDeps } from "./task_support";

export const STUDENT_EVALUATOR = "student_evaluator";

export const SYNTHESIS_INPUTS = [
  APPLICATION_READER,
  GRADE_READER,
  RECOMMENDATION_READER,
  SCHOOL_ENRICHMENT,
  SCHOOL_CONTEXT,
] as const;

export const Recommendation = z.enum([
  "strongly_recommend",
  "recommend",
  "consider",
  "not_recommended",
  "insufficient_data",
]);

export const Evaluation = z.object({
  overallScore: z.number().min(0).max(100).nullable(),
  recommendation: Recommendation,
  strengths: z.array(z.string()),
  concerns: z.array(z.string()),
  contributions: z.record(z.string(), z.string()),
  componentScores: z.record(z.string(), z.number().nullable()),
  unknownInputs: z.array(z.string()),
  rationale: z.string(),
  confidence: Confidence.optional(),
});

export type Evaluation = z.infer<typeof Evaluation>;

const ENDORSEMENT_SCORES: Record<string, number> = {
  strong: 92,
  moderate: 75,
  weak: 55,
  none: 40,
};

const WEIGHTS = {
  academics: 0.4,
  application: 0.3,
  recommendations: 0.2,
  context: 0.1,
};

export function recommendationFor(score: number | null): z.infer<typeof Recommendation> {
  if (score === null) return "insufficient_data";
  if (score >= 85) return "strongly_recommend";
  if (score >= 70) return "recommend";
  if (score >= 55) return "consider";
  return "not_recommended";
}

/**
 * Combines whatever inputs are available. Every unavailable input contributes
 * the unknown marker and drops out of the weighted score.
 */
export function synthesize(ctx: Pick<TaskContext, "inputs">): Evaluation {
  const payloadOf = (name: string) => inputPayload(ctx, name);
  const application = payloadOf(APPLICATION_READER);
  const grades = payloadOf(GRADE_READER);
  const letters = payloadOf(RECOMMENDATION_READER);
  const context = payloadOf(SCHOOL_CONTEXT) ?? payloadOf(SCHOOL_ENRICHMENT);

  const gpa = readNumber(grades, "gpa");
  const componentScores: Record<string, number | null> = {
    academics: gpa === null ? null : Math.round(Math.min(gpa, 4) * 25),
    application: readNumber(application, "readinessScore"),
    recommendations: letters
      ? ENDORSEMENT_SCORES[readString(letters, "endorsementStrength") ?? "none"] ?? null
      : null,
    // Lower opportunity earns more credit for the same record.
    context: (() => {
      const score = readNumber(context, "opportunityScore");
      return score === null ? null : Math.round(100 - score / 2);
    })(),
  };

  let weighted = 0;
  let weightSum = 0;
  for (const [key, weight] of Object.entries(WEIGHTS)) {
    const score = componentScores[key];
    if (score === null || score === undefined) continue;
    weighted += score * weight;
    weightSum += weight;
  }
  const overallScore = weightSum > 0 ? Math.round(weighted / weightSum) : null;

  const contributions: Record<string, string> = {};
  const unknownInputs: string[] = [];
  for (const name of SYNTHESIS_INPUTS) {
    const input = ctx.inputs[name];
    if (!input?.available) {
      contributions[name] = UNKNOWN_INPUT;
      unknownInputs.push(name);
      continue;
    }
    contributions[name] =
      readString(input.payload, "summary") ??
      readString(input.payload, "contextSummary") ??
      readString(input.payload, "analysisSummary") ??
      (readString(input.payload, "academicStrength")
        ? `academic strength: ${readString(input.payload, "academicStrength")}`
        : "available");
  }

  const strengths: string[] = [];
  const concerns: string[] = [];
  if (gpa !== null && gpa >= 3.5) strengths.push(`GPA ${gpa}`);
  if (gpa !== null && gpa < 2.8) concerns.push(`GPA ${gpa}`);
  if ((readNumber(grades, "apCount") ?? 0) >= 3) strengths.push("advanced coursework");
  if (readString(letters, "endorsementStrength") === "strong") strengths.push("strong recommendations");
  if ((componentScores.application ?? 100) < 40) concerns.push("thin application material");
  if (unknownInputs.length > 0) concerns.push(`missing inputs: ${unknownInputs.join(", ")}`);

  const recommendation = recommendationFor(overallScore);
  const available = SYNTHESIS_INPUTS.length - unknownInputs.length;
  return {
    overallScore,
    recommendation,
    strengths,
    concerns,
    contributions,
    componentScores,
    unknownInputs,
    rationale:
      overallScore === null
        ? "Not enough information to score the application."
        : `Weighted score ${overallScore} from ${available} of ${SYNTHESIS_INPUTS.length} inputs.`,
    confidence: available >= 4 ? "high" : available >= 2 ? "medium" : "low",
  };
}

export function studentEvaluatorTask(deps: TaskDeps): AnalysisTaskDefinition {
  return {
    name: STUDENT_EVALUATOR,
    kind: "analysis",
    description: "Synthesizes every analysis into one evaluation",
    requires: [],
    prefers: [...SYNTHESIS_INPUTS],
    required: true,
    run: async (ctx) => {
      const draft = synthesize(ctx);
      const evidence: JsonObject = {};
      for (const name of SYNTHESIS_INPUTS) {
        const input = ctx.inputs[name];
        evidence[name] = input?.available ? input.payload : UNKNOWN_INPUT;
      }

      const evaluation = await completeWithModel({
        deps,
        ctx,
        taskName: STUDENT_EVALUATOR,
        instructions:
          "You evaluate student applications from prior analyses. Treat inputs marked unknown as missing, not negative. Return JSON with the baseline's keys.",
        sections: [
          { id: "rules", title: "Task", content: "Weigh academics, application, recommendations and school context." },
          { id: "evidence", title: "Analyses", content: JSON.stringify(evidence, null, 2) },
        ],
        draft,
        schema: Evaluation,
      });

      const { confidence, ...payload } = evaluation;
      return { payload, confidence: confidence ?? draft.confidence ?? "medium" };
    },
  };
}
