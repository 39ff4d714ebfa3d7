import { z } from "zod";

import { Confidence } from "../contracts/case";
import type { AnalysisTaskDefinition } from "../pipeline/task";
import { DOCUMENT_EXTRACTION } from "./document_extraction";
import {
  completeWithModel,
  inputPayload,
  readString,
  sectionText,
  wordCount,
  type TaskDeps,
} from "./task_support";

export const APPLICATION_READER = "application_reader";

const INTEREST_KEYWORDS = [
  "robotics",
  "engineering",
  "medicine",
  "biology",
  "chemistry",
  "physics",
  "mathematics",
  "computer science",
  "programming",
  "music",
  "art",
  "writing",
  "debate",
  "community service",
  "volunteer",
  "athletics",
  "entrepreneurship",
  "environment",
];

const STRENGTH_SIGNALS = ["leadership", "award", "founded", "captain", "president", "research", "volunteer"];

export const ApplicationReading = z.object({
  summary: z.string().min(1),
  interests: z.array(z.string()),
  highlights: z.array(z.string()),
  essayWordCount: z.number().int().nonnegative(),
  readinessScore: z.number().min(0).max(100),
  confidence: Confidence.optional(),
});

export type ApplicationReading = z.infer<typeof ApplicationReading>;

export function draftApplicationReading(applicationText: string, applicantName: string | null): ApplicationReading {
  const lower = applicationText.toLowerCase();
  const words = wordCount(applicationText);
  const interests = INTEREST_KEYWORDS.filter((keyword) => lower.includes(keyword));
  const highlights = STRENGTH_SIGNALS.filter((signal) => lower.includes(signal));

  // Essay length, breadth of interests and concrete achievements.
  const lengthScore = Math.min(40, Math.round((words / 400) * 40));
  const interestScore = Math.min(25, interests.length * 5);
  const highlightScore = Math.min(35, highlights.length * 7);
  const readinessScore = words === 0 ? 0 : lengthScore + interestScore + highlightScore;

  const who = applicantName ?? "The applicant";
  const summary =
    words === 0
      ? "No application essay or statement was found in the submission."
      : `${who} submitted ${words} words of application material` +
        (interests.length > 0 ? ` describing interests in ${interests.slice(0, 3).join(", ")}.` : ".");

  return {
    summary,
    interests,
    highlights,
    essayWordCount: words,
    readinessScore,
    confidence: words >= 250 ? "high" : words >= 80 ? "medium" : "low",
  };
}

export function applicationReaderTask(deps: TaskDeps): AnalysisTaskDefinition {
  return {
    name: APPLICATION_READER,
    kind: "analysis",
    description: "Reads the essay and application answers",
    requires: [DOCUMENT_EXTRACTION],
    prefers: [],
    required: true,
    run: async (ctx) => {
      const extraction = inputPayload(ctx, DOCUMENT_EXTRACTION);
      const applicationText = sectionText(extraction, "application");
      const draft = draftApplicationReading(applicationText, readString(extraction, "applicantName"));

      const reading = await completeWithModel({
        deps,
        ctx,
        taskName: APPLICATION_READER,
        instructions:
          "You read student application essays. Return JSON with keys summary, interests, highlights, essayWordCount, readinessScore (0-100), confidence.",
        sections: [
          { id: "rules", title: "Task", content: "Summarize the applicant's goals, interests and readiness." },
          { id: "application", title: "Application material", content: applicationText || "(none)" },
        ],
        draft,
        schema: ApplicationReading,
      });

      const { confidence, ...payload } = reading;
      return { payload, confidence: confidence ?? draft.confidence ?? "medium" };
    },
  };
}
