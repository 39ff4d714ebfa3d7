import type { JsonObject } from "../contracts/case";

export type TaskModelRequest = {
  taskName: string;
  instructions: string;
  prompt: string;
  /** Deterministic baseline computed by the task from its inputs. */
  draft: JsonObject;
  signal?: AbortSignal;
};

export interface TaskModel {
  readonly provider: "fake" | "openai";
  /** Resolves with the parsed JSON body; callers validate its shape. */
  complete(request: TaskModelRequest): Promise<unknown>;
}
