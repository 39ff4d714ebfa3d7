const REJECTED_FRAGMENTS = ["TRANSCRIPT", "RECORD OF", "STUDENT ID"];

/**
 * Canonical form of a school name as found in free text. Returns null when the
 * value does not look like a school name at all.
 */
export function cleanSchoolName(raw: string | null | undefined): string | null {
  if (!raw) return null;

  let name = raw.replace(/\s+/g, " ").trim();
  name = name.replace(/^[-:,\s]+|[-:,\s]+$/g, "");
  name = name.replace(/\s+(Location|Campus|Site)$/i, "");
  name = name.replace(/\bHS\b\.?/g, "High School");
  name = name.replace(/\bSchool\s+School\b/gi, "School");
  name = name.trim();

  if (name.length < 3) return null;
  const upper = name.toUpperCase();
  if (REJECTED_FRAGMENTS.some((fragment) => upper.includes(fragment))) return null;
  return name;
}

export const schoolKey = (name: string) =>
  name
    .toLowerCase()
    .replace(/[^a-z0-9 ]/g, "")
    .replace(/\s+/g, " ")
    .trim();

export const sameSchool = (a: string, b: string) => schoolKey(a) === schoolKey(b);

export function extractSchoolName(text: string): string | null {
  const match = text.match(/(?:school name|high school|school)\s*:\s*([^\n]+)/i);
  return cleanSchoolName(match?.[1]);
}

export function extractLocation(text: string): { city: string; stateCode: string } | null {
  const match = text.match(/\b([A-Z][a-z]+(?: [A-Z][a-z]+)*),\s*([A-Z]{2})\b/);
  if (!match) return null;
  return { city: match[1], stateCode: match[2] };
}
