import { isJsonObject } from "../contracts/case";
import { ModelProviderError } from "../pipeline/errors";
import type { PipelineLogger } from "../log";
import type { TaskModel, TaskModelRequest } from "./task_model";

type ErrorBody = { type?: string; code?: string; message?: string };

const readErrorBody = (text: string): ErrorBody => {
  try {
    const parsed: unknown = JSON.parse(text);
    if (!isJsonObject(parsed) || !isJsonObject(parsed.error)) return {};
    const { type, code, message } = parsed.error;
    return {
      type: typeof type === "string" ? type : undefined,
      code: typeof code === "string" ? code : undefined,
      message: typeof message === "string" ? message : undefined,
    };
  } catch {
    return {};
  }
};

const parseRetryAfter = (header: string | null): number | undefined => {
  if (!header) return undefined;
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) return Math.max(0, Math.floor(seconds * 1000));
  const retryDate = Date.parse(header);
  if (!Number.isNaN(retryDate)) return Math.max(0, retryDate - Date.now());
  return undefined;
};

/** First text part of a Responses API body. */
export function extractOutputText(data: unknown): string | undefined {
  if (!isJsonObject(data)) return undefined;
  const output = Array.isArray(data.output) ? data.output : [];
  for (const item of output) {
    const parts = isJsonObject(item) && Array.isArray(item.content) ? item.content : [];
    for (const part of parts) {
      if (isJsonObject(part) && typeof part.text === "string") return part.text;
    }
  }
  return typeof data.output_text === "string" ? data.output_text : undefined;
}

export class OpenAITaskModel implements TaskModel {
  readonly provider = "openai" as const;
  private apiKey?: string;
  private model: string;
  private baseUrl: string;
  private log?: PipelineLogger;

  constructor(opts: { apiKey?: string; model: string; baseUrl?: string; log?: PipelineLogger }) {
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.baseUrl = opts.baseUrl ?? "https://api.openai.com/v1";
    this.log = opts.log;
  }

  async complete(request: TaskModelRequest): Promise<unknown> {
    if (!this.apiKey) {
      throw new ModelProviderError("OPENAI_API_KEY missing", { statusCode: 500, retryable: false });
    }

    const res = await fetch(`${this.baseUrl}/responses`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        store: false,
        stream: false,
        instructions: request.instructions,
        input: request.prompt,
        text: { format: { type: "json_object" } },
      }),
      signal: request.signal,
    });

    if (!res.ok) {
      const text = await res.text();
      const body = readErrorBody(text);
      const bodySnippet = (body.message ?? text).slice(0, 500);
      const statusCode = res.status;
      const retryable = body.type !== "invalid_request_error" && statusCode !== 401 && statusCode !== 403;
      this.log?.error(
        {
          evt: "openai.request_failed",
          taskName: request.taskName,
          statusCode,
          requestId: res.headers.get("x-request-id") ?? undefined,
          errorType: body.type,
          errorCode: body.code,
          bodySnippet,
        },
        "openai.request_failed"
      );
      throw new ModelProviderError(`OpenAI error ${statusCode}: ${bodySnippet}`, {
        statusCode,
        retryable,
        errorType: body.type,
        errorCode: body.code,
        retryAfterMs: parseRetryAfter(res.headers.get("retry-after")),
      });
    }

    const content = extractOutputText(await res.json());
    if (!content) {
      throw new ModelProviderError("OpenAI response missing content", {
        statusCode: 502,
        retryable: true,
      });
    }

    try {
      return JSON.parse(content);
    } catch {
      throw new ModelProviderError(`OpenAI response for ${request.taskName} is not JSON`, {
        statusCode: 502,
        retryable: true,
        errorCode: "invalid_json",
      });
    }
  }
}
