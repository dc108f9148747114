import { z } from "zod";
import { RAG_CONFIG } from "./config.js";
import { CompletionError } from "./errors.js";
import { consoleLogger, type Logger } from "./logger.js";
import { callWithTimeout, withRetry } from "./resilience.js";
import type { DocumentMetadata, MetadataExtractor } from "./types.js";

const OPENROUTER_API_URL = "https://openrouter.ai/api/v1/chat/completions";

const CompletionResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }).optional() })),
});

function blankToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export const MetadataResponseSchema = z
  .object({
    Title: z.string().nullish(),
    Authors: z.array(z.string()).nullish(),
    Year: z.union([z.string(), z.number()]).nullish(),
    Citation: z.string().nullish(),
  })
  .transform(
    (raw): DocumentMetadata => ({
      title: blankToNull(raw.Title),
      authors: (raw.Authors ?? []).map((a) => a.trim()).filter((a) => a.length > 0),
      year: raw.Year === null || raw.Year === undefined ? null : blankToNull(String(raw.Year)),
      citation: blankToNull(raw.Citation),
    }),
  );

/** Models sometimes wrap JSON in a markdown fence despite json_object mode. */
export function stripCodeFence(content: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(content.trim());
  return fenced?.[1] ?? content.trim();
}

export function renderPrompt(template: string, document: string): string {
  return template.replaceAll("{document}", () => document);
}

export interface LlmMetadataExtractorOptions {
  apiKey: string;
  template: string;
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  logger?: Logger;
}

export class LlmMetadataExtractor implements MetadataExtractor {
  private readonly logger: Logger;

  constructor(private readonly options: LlmMetadataExtractorOptions) {
    this.logger = options.logger ?? consoleLogger;
  }

  private async complete(prompt: string): Promise<string> {
    const res = await callWithTimeout(
      "metadata extraction",
      this.options.timeoutMs ?? RAG_CONFIG.requestTimeoutMs,
      (signal) =>
        fetch(OPENROUTER_API_URL, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${this.options.apiKey}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify({
            model: this.options.model ?? RAG_CONFIG.metadataModel,
            messages: [{ role: "user", content: prompt }],
            temperature: 0,
            response_format: { type: "json_object" },
          }),
          signal,
        }),
    );

    if (!res.ok) {
      const text = await res.text();
      throw new CompletionError(`API error (${res.status}): ${text}`, res.status);
    }

    const json = CompletionResponseSchema.parse(await res.json());
    const content = json.choices[0]?.message?.content;
    if (!content) throw new CompletionError("Completion returned no content");
    return content;
  }

  async extract(snippet: string): Promise<DocumentMetadata> {
    const prompt = renderPrompt(this.options.template, snippet);
    const content = await withRetry(() => this.complete(prompt), {
      label: "metadata",
      maxRetries: this.options.maxRetries ?? RAG_CONFIG.maxRetries,
      baseDelayMs: this.options.retryBaseDelayMs ?? RAG_CONFIG.retryBaseDelayMs,
      logger: this.logger,
    });
    return MetadataResponseSchema.parse(JSON.parse(stripCodeFence(content)));
  }
}
