import { UNKNOWN_INPUT, type JsonObject } from "../contracts/case";
import type { AnalysisTaskDefinition, TaskContext } from "../pipeline/task";
import { APPLICATION_READER } from "./application_reader";
import { DOCUMENT_EXTRACTION } from "./document_extraction";
import { GRADE_READER } from "./grade_reader";
import { RECOMMENDATION_READER } from "./recommendation_reader";
import { SCHOOL_CONTEXT } from "./school_context";
import { STUDENT_EVALUATOR } from "./student_evaluator";
import { inputPayload, readNumber, readString, readStringList } from "./task_support";

export const EVALUATION_REPORT = "evaluation_report";

export type ReportSection = { heading: string; body: string };

const RECOMMENDATION_LABELS: Record<string, string> = {
  strongly_recommend: "Strongly recommend",
  recommend: "Recommend",
  consider: "Consider",
  not_recommended: "Not recommended",
  insufficient_data: "Insufficient data",
};

const bullets = (items: string[]) => (items.length > 0 ? items.map((item) => `- ${item}`).join("\n") : "- none");

function sectionFrom(ctx: Pick<TaskContext, "inputs">, taskName: string, heading: string, key: string): ReportSection {
  const payload = inputPayload(ctx, taskName);
  return { heading, body: readString(payload, key) ?? UNKNOWN_INPUT };
}

export function renderReport(ctx: Pick<TaskContext, "inputs">): { title: string; sections: ReportSection[]; markdown: string } {
  const evaluation = inputPayload(ctx, STUDENT_EVALUATOR);
  const extraction = inputPayload(ctx, DOCUMENT_EXTRACTION);
  const applicant = readString(extraction, "applicantName") ?? "Unnamed applicant";
  const title = `Evaluation: ${applicant}`;

  const score = readNumber(evaluation, "overallScore");
  const recommendation = readString(evaluation, "recommendation") ?? "insufficient_data";
  const sections: ReportSection[] = [
    {
      heading: "Recommendation",
      body: `${RECOMMENDATION_LABELS[recommendation] ?? recommendation} (overall score: ${score ?? "n/a"})`,
    },
    { heading: "Strengths", body: bullets(readStringList(evaluation, "strengths")) },
    { heading: "Concerns", body: bullets(readStringList(evaluation, "concerns")) },
    sectionFrom(ctx, APPLICATION_READER, "Application", "summary"),
    sectionFrom(ctx, GRADE_READER, "Academics", "academicStrength"),
    sectionFrom(ctx, RECOMMENDATION_READER, "Recommendations", "summary"),
    sectionFrom(ctx, SCHOOL_CONTEXT, "School context", "contextSummary"),
  ];

  const markdown = [`# ${title}`, ...sections.map((s) => `## ${s.heading}\n${s.body}`)].join("\n\n");
  return { title, sections, markdown };
}

export function evaluationReportTask(): AnalysisTaskDefinition {
  return {
    name: EVALUATION_REPORT,
    kind: "analysis",
    description: "Formats the evaluation for reviewers",
    requires: [STUDENT_EVALUATOR],
    prefers: [DOCUMENT_EXTRACTION, APPLICATION_READER, GRADE_READER, RECOMMENDATION_READER, SCHOOL_CONTEXT],
    required: true,
    retries: 0,
    run: async (ctx) => {
      const report = renderReport(ctx);
      const payload: JsonObject = { ...report, sections: report.sections.map((s) => ({ ...s })) };
      const evaluation = ctx.inputs[STUDENT_EVALUATOR];
      return { payload, confidence: evaluation?.available ? evaluation.confidence : "low" };
    },
  };
}
