import { describe, it, expect } from "vitest";

import { UNKNOWN_INPUT } from "../src/contracts/case";
import { DOCUMENT_EXTRACTION } from "../src/tasks/document_extraction";
import { GRADE_READER } from "../src/tasks/grade_reader";
import {
  applyRemediation,
  draftSchoolEnrichment,
  NEUTRAL_OPPORTUNITY_SCORE,
  SCHOOL_ENRICHMENT,
} from "../src/tasks/school_enrichment";
import { checkEnrichment, evaluateSchoolContext, relativeStanding } from "../src/tasks/school_context";
import { opportunityScore, SchoolReference } from "../src/tasks/school_reference";
import { available, taskContext } from "./helpers/task_context";

const schools = SchoolReference.load();

describe("SchoolReference", () => {
  it("resolves names and aliases regardless of case and punctuation", () => {
    expect(schools.lookup("Lincoln High School")?.state).toBe("IL");
    expect(schools.lookup("lincoln hs")?.name).toBe("Lincoln High School");
    expect(schools.lookup("Riverside Acad.")?.name).toBe("Riverside Academy");
    expect(schools.lookup("Harbor Point Academy")).toBeNull();
    expect(schools.lookup(null)).toBeNull();
  });

  it("scores opportunity from the base score and the advanced coursework on offer", () => {
    const score = (name: string) => {
      const entry = schools.lookup(name);
      return entry ? opportunityScore(entry) : null;
    };
    expect(score("Lincoln High School")).toBe(87);
    expect(score("Harbor View High School")).toBe(63);
    expect(score("Maple Grove Secondary School")).toBe(80);
    expect(score("Cedar Ridge Prep")).toBe(100);
  });
});

describe("school enrichment", () => {
  it("fills the profile from the reference table", () => {
    const draft = draftSchoolEnrichment({
      extractedName: "Lincoln HS",
      extractedCity: null,
      extractedState: null,
      reference: schools.lookup("Lincoln HS"),
    });
    expect(draft).toEqual({
      schoolName: "Lincoln High School",
      city: "Springfield",
      stateCode: "IL",
      opportunityScore: 87,
      apCoursesAvailable: 14,
      programs: ["AP Capstone", "Robotics Club", "Dual Enrollment"],
      dataSources: ["source_text", "school_reference"],
      analysisSummary:
        "Lincoln High School (IL): opportunity score 87; programs: AP Capstone, Robotics Club, Dual Enrollment.",
      confidence: "high",
    });
  });

  it("leaves the score empty for a school outside the table", () => {
    const draft = draftSchoolEnrichment({
      extractedName: "Harbor Point Academy",
      extractedCity: "Mapleton",
      extractedState: "VT",
      reference: null,
    });
    expect(draft.opportunityScore).toBeNull();
    expect(draft.confidence).toBe("medium");
    expect(draft.analysisSummary).toBe("Harbor Point Academy (VT): no opportunity score.");
  });

  it("applies a neutral score when remediation asks for one", () => {
    const draft = draftSchoolEnrichment({
      extractedName: "Harbor Point Academy",
      extractedCity: "Mapleton",
      extractedState: "VT",
      reference: null,
    });
    const next = applyRemediation(
      draft,
      {
        attemptNumber: 1,
        previousOutput: null,
        hint: { missingFields: ["opportunityScore"], inconsistencies: [], guidance: "" },
      },
      "Harbor Point Academy"
    );
    expect(next.opportunityScore).toBe(NEUTRAL_OPPORTUNITY_SCORE);
    expect(next.dataSources).toEqual(["source_text", "neutral_estimate"]);
    expect(next.confidence).toBe("low");
    expect(draft.dataSources).toEqual(["source_text"]);
  });

  it("keeps a score settled by an earlier attempt", () => {
    const draft = draftSchoolEnrichment({
      extractedName: "Harbor Point Academy",
      extractedCity: null,
      extractedState: null,
      reference: null,
    });
    const next = applyRemediation(
      draft,
      {
        attemptNumber: 2,
        previousOutput: { opportunityScore: 50, dataSources: ["source_text", "neutral_estimate"] },
        hint: { missingFields: ["stateCode"], inconsistencies: [], guidance: "" },
      },
      "Harbor Point Academy"
    );
    expect(next.opportunityScore).toBe(50);
    expect(next.dataSources).toEqual(["source_text", "neutral_estimate"]);
    expect(next.stateCode).toBeNull();
    expect(next.analysisSummary).toBe("Harbor Point Academy: opportunity score 50.");
  });
});

describe("school context validation", () => {
  const enrichment = {
    schoolName: "Lincoln High School",
    stateCode: "IL",
    opportunityScore: 87,
    apCoursesAvailable: 14,
    programs: ["Robotics Club"],
  };

  it("accepts a complete profile that agrees with the extraction", () => {
    expect(
      checkEnrichment(schools, enrichment, { schoolName: "Lincoln HS", stateCode: "IL" })
    ).toEqual({ missingFields: [], inconsistencies: [] });
  });

  it("reports missing fields and disagreements", () => {
    expect(
      checkEnrichment(
        schools,
        { schoolName: "Riverside Academy", stateCode: "Illinois", opportunityScore: 140 },
        { schoolName: "Lincoln High School", stateCode: "IL" }
      )
    ).toEqual({
      missingFields: ["stateCode", "opportunityScore"],
      inconsistencies: [
        'schoolName "Riverside Academy" does not match extracted "Lincoln High School"',
        "stateCode Illinois does not match extracted IL",
      ],
    });
  });

  it("places the applicant's AP load against the school's offerings", () => {
    expect(relativeStanding(null, 14)).toBe(UNKNOWN_INPUT);
    expect(relativeStanding(8, 14)).toBe("took most of the advanced courses available");
    expect(relativeStanding(4, 14)).toBe("took a solid share of the advanced courses available");
    expect(relativeStanding(3, 14)).toBe("took few of the advanced courses available");
    expect(relativeStanding(2, null)).toBe("took advanced courses at a school with limited offerings");
  });

  it("accepts with a context summary", () => {
    const verdict = evaluateSchoolContext(
      schools,
      taskContext({
        inputs: {
          [SCHOOL_ENRICHMENT]: available(enrichment),
          [DOCUMENT_EXTRACTION]: available({ schoolName: "Lincoln High School", stateCode: "IL" }),
          [GRADE_READER]: available({ apCount: 3 }),
        },
      })
    );
    expect(verdict.verdict).toBe("accepted");
    expect(verdict.confidence).toBe("high");
    expect(verdict.payload.contextSummary).toBe(
      "Lincoln High School has an opportunity score of 87; the applicant took few of the advanced courses available."
    );
  });

  it("asks for remediation with a hint when fields are missing", () => {
    const verdict = evaluateSchoolContext(
      schools,
      taskContext({
        inputs: {
          [SCHOOL_ENRICHMENT]: available({ schoolName: "Harbor Point Academy", stateCode: null, opportunityScore: null }),
        },
      })
    );
    expect(verdict.verdict).toBe("needs_remediation");
    expect(verdict.confidence).toBe("low");
    if (verdict.verdict === "needs_remediation") {
      expect(verdict.hint.missingFields).toEqual(["stateCode", "opportunityScore"]);
      expect(verdict.hint.inconsistencies).toEqual([]);
    }
  });
});
