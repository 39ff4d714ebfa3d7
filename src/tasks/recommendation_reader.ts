import { z } from "zod";

import { Confidence } from "../contracts/case";
import type { AnalysisTaskDefinition } from "../pipeline/task";
import { DOCUMENT_EXTRACTION } from "./document_extraction";
import { completeWithModel, inputPayload, sectionText, type TaskDeps } from "./task_support";

export const RECOMMENDATION_READER = "recommendation_reader";

export const EndorsementStrength = z.enum(["strong", "moderate", "weak", "none"]);

export const RecommendationReading = z.object({
  recommenderCount: z.number().int().nonnegative(),
  endorsementStrength: EndorsementStrength,
  keyEndorsements: z.array(z.string()),
  summary: z.string().min(1),
  confidence: Confidence.optional(),
});

export type RecommendationReading = z.infer<typeof RecommendationReading>;

const STRONG_PHRASES = [
  "highest recommendation",
  "without reservation",
  "one of the best",
  "most talented",
  "exceptional",
  "top 1%",
  "top 5%",
];

const MODERATE_PHRASES = ["i recommend", "recommend", "strong student", "hard-working", "dedicated"];

const LETTER_OPENERS = /^(?:dear\b|to whom it may concern)/gim;

export function draftRecommendationReading(letters: string): RecommendationReading {
  const lower = letters.toLowerCase();
  const openers = letters.match(LETTER_OPENERS)?.length ?? 0;
  const recommenderCount = letters.trim().length === 0 ? 0 : Math.max(1, openers);

  const strong = STRONG_PHRASES.filter((phrase) => lower.includes(phrase)).length;
  const moderate = MODERATE_PHRASES.filter((phrase) => lower.includes(phrase)).length;
  const endorsementStrength =
    recommenderCount === 0 ? "none" : strong >= 2 ? "strong" : strong === 1 || moderate >= 2 ? "moderate" : "weak";

  const keyEndorsements = letters
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => /recommend|exceptional|best|talented/i.test(sentence))
    .slice(0, 3);

  const summary =
    recommenderCount === 0
      ? "No recommendation letters were found in the submission."
      : `${recommenderCount} recommendation letter(s) with ${endorsementStrength} endorsement.`;

  return {
    recommenderCount,
    endorsementStrength,
    keyEndorsements,
    summary,
    confidence: recommenderCount === 0 ? "low" : strong + moderate >= 2 ? "high" : "medium",
  };
}

export function recommendationReaderTask(deps: TaskDeps): AnalysisTaskDefinition {
  return {
    name: RECOMMENDATION_READER,
    kind: "analysis",
    description: "Reads recommendation letters",
    requires: [DOCUMENT_EXTRACTION],
    prefers: [],
    required: true,
    run: async (ctx) => {
      const letters = sectionText(inputPayload(ctx, DOCUMENT_EXTRACTION), "recommendation");
      const draft = draftRecommendationReading(letters);

      const reading = await completeWithModel({
        deps,
        ctx,
        taskName: RECOMMENDATION_READER,
        instructions:
          "You read recommendation letters. Return JSON with keys recommenderCount, endorsementStrength (strong|moderate|weak|none), keyEndorsements, summary, confidence.",
        sections: [
          { id: "rules", title: "Task", content: "Judge how strongly the recommenders endorse the applicant." },
          { id: "letters", title: "Recommendation letters", content: letters || "(none)" },
        ],
        draft,
        schema: RecommendationReading,
      });

      const { confidence, ...payload } = reading;
      return { payload, confidence: confidence ?? draft.confidence ?? "medium" };
    },
  };
}
