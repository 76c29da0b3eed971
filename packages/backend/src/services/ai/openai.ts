import OpenAI from "openai";
import type { z } from "zod";
import { config } from "../../config.js";
import { logger } from "../../lib/logger.js";
import { ServiceUnavailableError, UpstreamError } from "../../lib/errors.js";

let client: OpenAI | null = null;

export function is_ai_available(): boolean {
  return Boolean(config.openai_api_key);
}

function get_client(): OpenAI {
  if (!config.openai_api_key) {
    throw new ServiceUnavailableError("OpenAI is not configured: set OPENAI_API_KEY");
  }

  if (!client) {
    client = new OpenAI({ apiKey: config.openai_api_key });
  }

  return client;
}

interface CompletionOptions {
  temperature?: number;
  json?: boolean;
}

async function complete(system: string, user: string, options: CompletionOptions): Promise<string> {
  const start = Date.now();
  const completion = await get_client()
    .chat.completions.create({
      model: config.openai_model,
      temperature: options.temperature ?? 0.05,
      messages: [
        { role: "system", content: system },
        { role: "user", content: user },
      ],
      ...(options.json ? { response_format: { type: "json_object" as const } } : {}),
    })
    .catch((err: unknown) => {
      throw new UpstreamError("OpenAI request failed", err);
    });

  const content = completion.choices[0]?.message.content?.trim() ?? "";
  logger.debug("openai completion", {
    model: config.openai_model,
    duration_ms: Date.now() - start,
    total_tokens: completion.usage?.total_tokens,
  });

  if (!content) {
    throw new UpstreamError("OpenAI returned an empty completion");
  }
  return content;
}

export async function complete_text(system: string, user: string, temperature?: number): Promise<string> {
  return complete(system, user, { temperature });
}

export async function complete_json<T>(system: string, user: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const content = await complete(system, user, { json: true, temperature: 0 });

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new UpstreamError("OpenAI returned malformed JSON", err);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    logger.warn("openai json did not match schema", {
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
    throw new UpstreamError("OpenAI returned an unexpected JSON shape");
  }
  return result.data;
}
