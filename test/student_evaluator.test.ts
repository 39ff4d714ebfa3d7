import { describe, it, expect } from "vitest";

import { UNKNOWN_INPUT } from "../src/contracts/case";
import { APPLICATION_READER } from "../src/tasks/application_reader";
import { DOCUMENT_EXTRACTION } from "../src/tasks/document_extraction";
import { evaluationReportTask, renderReport } from "../src/tasks/evaluation_report";
import { GRADE_READER } from "../src/tasks/grade_reader";
import { RECOMMENDATION_READER } from "../src/tasks/recommendation_reader";
import { SCHOOL_CONTEXT } from "../src/tasks/school_context";
import { SCHOOL_ENRICHMENT } from "../src/tasks/school_enrichment";
import { recommendationFor, STUDENT_EVALUATOR, synthesize } from "../src/tasks/student_evaluator";
import { available, taskContext, unavailable } from "./helpers/task_context";

describe("recommendationFor", () => {
  it("bands the overall score", () => {
    expect(recommendationFor(85)).toBe("strongly_recommend");
    expect(recommendationFor(84)).toBe("recommend");
    expect(recommendationFor(70)).toBe("recommend");
    expect(recommendationFor(55)).toBe("consider");
    expect(recommendationFor(54)).toBe("not_recommended");
    expect(recommendationFor(null)).toBe("insufficient_data");
  });
});

describe("synthesize", () => {
  it("weights every component when all inputs are available", () => {
    const evaluation = synthesize(
      taskContext({
        inputs: {
          [APPLICATION_READER]: available({ summary: "Essay on robotics.", readinessScore: 51 }),
          [GRADE_READER]: available({ gpa: 3.85, apCount: 3, academicStrength: "exceptional" }),
          [RECOMMENDATION_READER]: available({ summary: "One strong letter.", endorsementStrength: "strong" }),
          [SCHOOL_ENRICHMENT]: available({ analysisSummary: "Lincoln profile.", opportunityScore: 87 }),
          [SCHOOL_CONTEXT]: available({ contextSummary: "Lincoln context.", opportunityScore: 87 }),
        },
      })
    );

    expect(evaluation).toEqual({
      overallScore: 78,
      recommendation: "recommend",
      strengths: ["GPA 3.85", "advanced coursework", "strong recommendations"],
      concerns: [],
      contributions: {
        application_reader: "Essay on robotics.",
        grade_reader: "academic strength: exceptional",
        recommendation_reader: "One strong letter.",
        school_enrichment: "Lincoln profile.",
        school_context: "Lincoln context.",
      },
      componentScores: { academics: 96, application: 51, recommendations: 92, context: 57 },
      unknownInputs: [],
      rationale: "Weighted score 78 from 5 of 5 inputs.",
      confidence: "high",
    });
  });

  it("scores from what is available and marks the rest unknown", () => {
    const evaluation = synthesize(
      taskContext({
        inputs: {
          [APPLICATION_READER]: unavailable("failed"),
          [GRADE_READER]: available({ gpa: 2.5, apCount: 0 }),
          [RECOMMENDATION_READER]: unavailable("failed"),
          [SCHOOL_ENRICHMENT]: unavailable("failed"),
          [SCHOOL_CONTEXT]: unavailable("skipped"),
        },
      })
    );

    expect(evaluation.overallScore).toBe(63);
    expect(evaluation.recommendation).toBe("consider");
    expect(evaluation.componentScores).toEqual({
      academics: 63,
      application: null,
      recommendations: null,
      context: null,
    });
    expect(evaluation.contributions.application_reader).toBe(UNKNOWN_INPUT);
    expect(evaluation.contributions.grade_reader).toBe("available");
    expect(evaluation.concerns).toEqual([
      "GPA 2.5",
      "missing inputs: application_reader, recommendation_reader, school_enrichment, school_context",
    ]);
    expect(evaluation.rationale).toBe("Weighted score 63 from 1 of 5 inputs.");
    expect(evaluation.confidence).toBe("low");
  });

  it("declines to score without inputs", () => {
    const evaluation = synthesize(taskContext({}));
    expect(evaluation.overallScore).toBeNull();
    expect(evaluation.recommendation).toBe("insufficient_data");
    expect(evaluation.unknownInputs).toHaveLength(5);
    expect(evaluation.rationale).toBe("Not enough information to score the application.");
  });
});

describe("evaluation report", () => {
  const inputs = {
    [STUDENT_EVALUATOR]: available(
      { overallScore: 78, recommendation: "recommend", strengths: ["GPA 3.85", "advanced coursework"], concerns: [] },
      "medium"
    ),
    [DOCUMENT_EXTRACTION]: available({ applicantName: "Maya Chen" }),
    [GRADE_READER]: available({ academicStrength: "exceptional" }),
    [APPLICATION_READER]: unavailable("failed"),
  };

  it("renders every section, with unknown markers for missing analyses", () => {
    const report = renderReport(taskContext({ inputs }));
    expect(report.title).toBe("Evaluation: Maya Chen");
    expect(report.markdown).toBe(
      [
        "# Evaluation: Maya Chen",
        "## Recommendation\nRecommend (overall score: 78)",
        "## Strengths\n- GPA 3.85\n- advanced coursework",
        "## Concerns\n- none",
        `## Application\n${UNKNOWN_INPUT}`,
        "## Academics\nexceptional",
        `## Recommendations\n${UNKNOWN_INPUT}`,
        `## School context\n${UNKNOWN_INPUT}`,
      ].join("\n\n")
    );
  });

  it("takes its confidence from the evaluation", async () => {
    const output = await evaluationReportTask().run(taskContext({ inputs }));
    expect(output.confidence).toBe("medium");
    expect(output.payload.title).toBe("Evaluation: Maya Chen");
  });
});
