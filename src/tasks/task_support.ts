import type { z } from "zod";

import { isJsonObject, type JsonObject } from "../contracts/case";
import { TaskOutputError } from "../pipeline/errors";
import type { RemediationRequest, TaskContext } from "../pipeline/task";
import type { PipelineLogger } from "../log";
import type { TaskModel } from "../providers/task_model";
import type { SchoolReference } from "./school_reference";

export type TaskDeps = {
  model: TaskModel;
  schools: SchoolReference;
  log?: PipelineLogger;
};

export type PromptSection = {
  id: string;
  title: string;
  content: string;
};

export function inputPayload(ctx: Pick<TaskContext, "inputs">, name: string): JsonObject | null {
  const input = ctx.inputs[name];
  return input?.available ? input.payload : null;
}

export const readString = (obj: JsonObject | null, key: string): string | null => {
  const value = obj?.[key];
  return typeof value === "string" && value.trim().length > 0 ? value : null;
};

export const readNumber = (obj: JsonObject | null, key: string): number | null => {
  const value = obj?.[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
};

export const readStringList = (obj: JsonObject | null, key: string): string[] => {
  const value = obj?.[key];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
};

export function sectionText(extraction: JsonObject | null, section: string): string {
  const sections = extraction?.sections;
  if (!isJsonObject(sections)) return "";
  const value = sections[section];
  return typeof value === "string" ? value : "";
}

export const wordCount = (text: string) => text.split(/\s+/).filter(Boolean).length;

export function buildCorrectionText(remediation: RemediationRequest): string {
  const { hint, attemptNumber } = remediation;
  const lines = [`CORRECTION (Attempt ${attemptNumber})`, "Your previous output was not accepted."];
  if (hint.missingFields.length > 0) {
    lines.push("Missing fields:", ...hint.missingFields.map((field) => `- ${field}`));
  }
  if (hint.inconsistencies.length > 0) {
    lines.push("Inconsistencies:", ...hint.inconsistencies.map((item) => `- ${item}`));
  }
  if (hint.guidance) lines.push(hint.guidance);
  return lines.join("\n");
}

/** Sections render in order; the correction block follows the task rules. */
export function renderPrompt(args: {
  sections: PromptSection[];
  draft: JsonObject;
  remediation: RemediationRequest | null;
}): string {
  const sections = [...args.sections];
  if (args.remediation) {
    sections.splice(1, 0, {
      id: "correction",
      title: "Correction",
      content: buildCorrectionText(args.remediation),
    });
  }
  sections.push({
    id: "baseline",
    title: "Baseline (deterministic extraction; correct it where the text disagrees)",
    content: JSON.stringify(args.draft, null, 2),
  });
  return sections.map((section) => `## ${section.title}\n${section.content.trim()}`).join("\n\n");
}

export async function completeWithModel<T extends z.ZodTypeAny>(args: {
  deps: TaskDeps;
  ctx: TaskContext;
  taskName: string;
  instructions: string;
  sections: PromptSection[];
  draft: JsonObject;
  schema: T;
}): Promise<z.infer<T>> {
  const prompt = renderPrompt({
    sections: args.sections,
    draft: args.draft,
    remediation: args.ctx.remediation,
  });
  const raw = await args.deps.model.complete({
    taskName: args.taskName,
    instructions: args.instructions,
    prompt,
    draft: args.draft,
    signal: args.ctx.signal,
  });
  const parsed = args.schema.safeParse(raw);
  if (!parsed.success) {
    throw new TaskOutputError(
      args.taskName,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
