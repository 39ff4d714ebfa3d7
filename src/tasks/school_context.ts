import { UNKNOWN_INPUT, type Confidence, type JsonObject } from "../contracts/case";
import type { TaskContext, ValidatorOutput, ValidatorTaskDefinition } from "../pipeline/task";
import { DOCUMENT_EXTRACTION } from "./document_extraction";
import { GRADE_READER } from "./grade_reader";
import { SCHOOL_ENRICHMENT } from "./school_enrichment";
import { cleanSchoolName, sameSchool } from "./school_names";
import type { SchoolReference } from "./school_reference";
import { inputPayload, readNumber, readString, readStringList } from "./task_support";

export const SCHOOL_CONTEXT = "school_context";

const STATE_CODE = /^[A-Z]{2}$/;

export type SchoolContextCheck = {
  missingFields: string[];
  inconsistencies: string[];
};

function namesAgree(schools: SchoolReference, a: string, b: string): boolean {
  if (sameSchool(a, b)) return true;
  const cleanA = cleanSchoolName(a);
  const cleanB = cleanSchoolName(b);
  if (cleanA && cleanB && sameSchool(cleanA, cleanB)) return true;
  const refA = schools.lookup(a);
  return refA !== null && refA === schools.lookup(b);
}

export function checkEnrichment(
  schools: SchoolReference,
  enrichment: JsonObject,
  extraction: JsonObject | null
): SchoolContextCheck {
  const missingFields: string[] = [];
  const inconsistencies: string[] = [];

  const schoolName = readString(enrichment, "schoolName");
  const stateCode = readString(enrichment, "stateCode");
  const score = readNumber(enrichment, "opportunityScore");

  if (!schoolName) missingFields.push("schoolName");
  if (!stateCode || !STATE_CODE.test(stateCode)) missingFields.push("stateCode");
  if (score === null || score < 0 || score > 100) missingFields.push("opportunityScore");

  const extractedName = readString(extraction, "schoolName");
  if (schoolName && extractedName && !namesAgree(schools, schoolName, extractedName)) {
    inconsistencies.push(`schoolName "${schoolName}" does not match extracted "${extractedName}"`);
  }
  const extractedState = readString(extraction, "stateCode");
  if (stateCode && extractedState && stateCode !== extractedState) {
    inconsistencies.push(`stateCode ${stateCode} does not match extracted ${extractedState}`);
  }
  return { missingFields, inconsistencies };
}

/** Where the applicant's AP load sits against what the school offers. */
export function relativeStanding(apTaken: number | null, apOffered: number | null): string {
  if (apTaken === null) return UNKNOWN_INPUT;
  if (!apOffered) return apTaken > 0 ? "took advanced courses at a school with limited offerings" : "no AP courses offered or taken";
  const ratio = apTaken / apOffered;
  if (ratio >= 0.5) return "took most of the advanced courses available";
  if (ratio >= 0.25) return "took a solid share of the advanced courses available";
  return "took few of the advanced courses available";
}

export function evaluateSchoolContext(schools: SchoolReference, ctx: TaskContext): ValidatorOutput {
  const enrichment = inputPayload(ctx, SCHOOL_ENRICHMENT) ?? {};
  const extraction = inputPayload(ctx, DOCUMENT_EXTRACTION);
  const grades = inputPayload(ctx, GRADE_READER);
  const check = checkEnrichment(schools, enrichment, extraction);

  const schoolName = readString(enrichment, "schoolName");
  const score = readNumber(enrichment, "opportunityScore");
  const standing = relativeStanding(
    grades ? readNumber(grades, "apCount") : null,
    readNumber(enrichment, "apCoursesAvailable")
  );
  const payload: JsonObject = {
    schoolName,
    stateCode: readString(enrichment, "stateCode"),
    opportunityScore: score,
    programs: readStringList(enrichment, "programs"),
    relativeStanding: standing,
    contextSummary: schoolName
      ? `${schoolName} has an opportunity score of ${score ?? "unknown"}; the applicant ${standing}.`
      : UNKNOWN_INPUT,
  };

  const problems = check.missingFields.length + check.inconsistencies.length;
  const confidence: Confidence = problems > 0 ? "low" : grades ? "high" : "medium";
  if (problems === 0) {
    return { verdict: "accepted", payload, confidence };
  }
  return {
    verdict: "needs_remediation",
    payload,
    confidence,
    hint: {
      ...check,
      guidance:
        "Provide a two-letter state code, an opportunity score between 0 and 100, and the school name as it appears in the submission.",
    },
  };
}

export function schoolContextTask(schools: SchoolReference): ValidatorTaskDefinition {
  return {
    name: SCHOOL_CONTEXT,
    kind: "validator",
    description: "Validates the school profile and places the applicant in school context",
    requires: [SCHOOL_ENRICHMENT],
    prefers: [GRADE_READER, DOCUMENT_EXTRACTION],
    required: true,
    retries: 0,
    run: async (ctx) => evaluateSchoolContext(schools, ctx),
  };
}
