import OpenAI from "openai";
import { requireApiKey } from "../config/env.js";
import type { Config } from "../config/types.js";
import { describeError } from "../errors.js";
import { log } from "../utils/logger.js";

const llmLog = log.withScope("llm");

export type LlmCallInput = {
  systemPrompt: string;
  userPrompt: string;
  model: string;
};

/** The oracle transport: one request in, raw reply text out. Throws on transport failure. */
export type LlmCall = (input: LlmCallInput) => Promise<string>;

export function createOpenAIClient(cfg: Config): OpenAI {
  const apiKey = requireApiKey(cfg);
  // Failures are absorbed into fallback records by the caller, never retried here.
  return new OpenAI({ apiKey, maxRetries: 0 });
}

export async function chat(
  client: OpenAI,
  opts: {
    systemPrompt: string;
    userMessage: string;
    model: string;
    temperature: number;
    maxTokens: number;
    responseFormat?: "text" | "json_object";
  },
): Promise<string> {
  try {
    const response = await client.chat.completions.create({
      model: opts.model,
      temperature: opts.temperature,
      max_tokens: opts.maxTokens,
      ...(opts.responseFormat === "json_object"
        ? { response_format: { type: "json_object" as const } }
        : {}),
      messages: [
        { role: "system", content: opts.systemPrompt },
        { role: "user", content: opts.userMessage },
      ],
    });

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new Error("Empty response from OpenAI");
    }

    return content;
  } catch (err: unknown) {
    const message = describeError(err);
    llmLog.error("OpenAI API error", { model: opts.model, message });
    throw new Error("LLM request failed: " + message);
  }
}

/** Binds chat() to the configured client and llm settings. */
export function createLlmCall(cfg: Config): LlmCall {
  const client = createOpenAIClient(cfg);

  return async (input) => {
    const start = Date.now();
    const reply = await chat(client, {
      systemPrompt: input.systemPrompt,
      userMessage: input.userPrompt,
      model: input.model,
      temperature: cfg.llm.temperature,
      maxTokens: cfg.llm.maxTokens,
      responseFormat: cfg.llm.jsonMode ? "json_object" : "text",
    });
    llmLog.debug("reply received", { ms: Date.now() - start, respChars: reply.length });
    return reply;
  };
}
