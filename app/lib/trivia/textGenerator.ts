import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { z } from "zod";
import type { AppConfig } from "../config";
import { TransportError, errorMessage } from "../errors";
import { withTimeout } from "../withTimeout";
import { TRIVIA_SYSTEM_PROMPT } from "./prompts";

/**
 * Text-generation boundary. Implementations throw TransportError when the
 * provider cannot be reached or answers with an error; whatever text comes
 * back is returned as-is for validation.
 */
export interface TextGenerator {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}

// Nine questions with several sentences of trivia each.
const MAX_OUTPUT_TOKENS = 4000;
const TEMPERATURE = 0.7;

// Per generation request
export const GENERATION_TIMEOUT_MS = 120_000;

/** The slice of `openai.chat.completions` the generator calls. */
export interface ChatCompletionsApi {
  create(
    body: ChatCompletionCreateParamsNonStreaming,
  ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
}

export class OpenAITextGenerator implements TextGenerator {
  readonly name = "openai";
  private completions: ChatCompletionsApi;
  private model: string;

  constructor(options: { apiKey: string; model: string; completions?: ChatCompletionsApi }) {
    this.completions =
      options.completions ??
      new OpenAI({ apiKey: options.apiKey, timeout: GENERATION_TIMEOUT_MS }).chat.completions;
    this.model = options.model;
  }

  async generate(prompt: string): Promise<string> {
    try {
      const response = await this.completions.create({
        model: this.model,
        temperature: TEMPERATURE,
        max_tokens: MAX_OUTPUT_TOKENS,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: TRIVIA_SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
      });
      return response.choices[0]?.message?.content ?? "";
    } catch (err) {
      const status = err instanceof OpenAI.APIError ? (err.status ?? null) : null;
      throw new TransportError(this.name, errorMessage(err), { status, cause: err });
    }
  }
}

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

export class AnthropicTextGenerator implements TextGenerator {
  readonly name = "anthropic";
  private apiKey: string;
  private model: string;
  private timeoutMs: number;

  constructor(options: { apiKey: string; model: string; timeoutMs?: number }) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? GENERATION_TIMEOUT_MS;
  }

  async generate(prompt: string): Promise<string> {
    const controller = new AbortController();
    let response: { status: number; ok: boolean; text: string };
    try {
      response = await withTimeout(
        fetch("https://api.anthropic.com/v1/messages", {
          method: "POST",
          signal: controller.signal,
          headers: {
            "Content-Type": "application/json",
            "x-api-key": this.apiKey,
            "anthropic-version": "2023-06-01",
          },
          body: JSON.stringify({
            model: this.model,
            max_tokens: MAX_OUTPUT_TOKENS,
            temperature: TEMPERATURE,
            system: TRIVIA_SYSTEM_PROMPT,
            messages: [{ role: "user", content: prompt }],
          }),
        }).then(async (res) => ({ status: res.status, ok: res.ok, text: await res.text() })),
        this.timeoutMs,
        "request",
        () => controller.abort(),
      );
    } catch (err) {
      throw new TransportError(this.name, errorMessage(err), { cause: err });
    }

    if (!response.ok) {
      throw new TransportError(this.name, `API error: ${response.status} ${response.text}`, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = JSON.parse(response.text);
    } catch (err) {
      throw new TransportError(this.name, "Response body is not JSON", { cause: err });
    }

    const parsed = AnthropicResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(this.name, "Unexpected response body");
    }

    return parsed.data.content
      .filter((block) => block.type === "text")
      .map((block) => block.text ?? "")
      .join("");
  }
}

export function getTextGenerator(ai: AppConfig["ai"]): TextGenerator {
  if (ai.provider === "anthropic") {
    return new AnthropicTextGenerator({ apiKey: ai.apiKey, model: ai.model });
  }
  return new OpenAITextGenerator({ apiKey: ai.apiKey, model: ai.model });
}
