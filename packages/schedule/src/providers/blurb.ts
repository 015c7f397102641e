/**
 * AI blurb provider.
 *
 * Asks a Bedrock-hosted Claude model to squeeze today's task titles into a
 * short line of abbreviations for the header. Uses forced tool_use so the
 * reply is always structured JSON.
 */

import { BedrockRuntimeClient, InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import { ProviderFetchError } from "@paperday/core";
import type { DataProvider } from "./provider.js";

export const DEFAULT_BLURB_PROMPT = [
  "You are an abbreviation expert. Given the titles on today's timetable, pick the two or three",
  "most representative words of each and abbreviate them:",
  "1. Keep existing all-caps acronyms unchanged.",
  "2. Short words keep their first 3 letters.",
  "3. Otherwise drop vowels and non-alphanumerics, keep 3-4 consonants, uppercase.",
  "Answer with one line, abbreviations separated by spaces and titles by ' / '.",
  "Example: 'Writing session DRG paper' -> 'DRG PPR'.",
].join("\n");

const MAX_BLURB_LENGTH = 160;

export interface BlurbProviderOptions {
  modelId: string;
  /** Titles to summarize for a date */
  titlesFor: (date: Date) => string[];
  prompt?: string;
  client?: BedrockRuntimeClient;
}

/**
 * Pull the `summary` string out of a Messages API response body
 */
export function parseBlurbResponse(body: Uint8Array): string {
  const result: unknown = JSON.parse(new TextDecoder().decode(body));
  const content =
    typeof result === "object" && result !== null && "content" in result && Array.isArray(result.content)
      ? result.content
      : [];

  // Search by type: the model may emit a text block before the tool call
  const toolUse: unknown = content.find(
    (block: unknown) =>
      typeof block === "object" && block !== null && "type" in block && block.type === "tool_use"
  );
  if (typeof toolUse !== "object" || toolUse === null || !("input" in toolUse)) {
    throw new Error("Model did not return a valid tool_use block");
  }

  const input = toolUse.input;
  if (typeof input !== "object" || input === null || !("summary" in input) || typeof input.summary !== "string") {
    throw new Error("Model tool_use response missing summary");
  }

  const summary = input.summary.replace(/\s+/g, " ").trim();
  return summary.length > MAX_BLURB_LENGTH ? summary.slice(0, MAX_BLURB_LENGTH) : summary;
}

export class BlurbProvider implements DataProvider<string | null> {
  readonly name = "blurb";
  private readonly client: BedrockRuntimeClient;
  private readonly prompt: string;

  constructor(private readonly options: BlurbProviderOptions) {
    this.client = options.client ?? new BedrockRuntimeClient({});
    this.prompt = options.prompt ?? DEFAULT_BLURB_PROMPT;
  }

  async fetch(date: Date): Promise<string | null> {
    const titles = this.options.titlesFor(date);
    if (titles.length === 0) return null;

    const userMessage =
      "Abbreviate each of the following titles:\n\n" +
      titles.map((title, i) => `${i + 1}. ${title}`).join("\n");

    try {
      const response = await this.client.send(
        new InvokeModelCommand({
          modelId: this.options.modelId,
          contentType: "application/json",
          accept: "application/json",
          body: JSON.stringify({
            anthropic_version: "bedrock-2023-05-31",
            max_tokens: 300,
            system: this.prompt,
            messages: [{ role: "user", content: userMessage }],
            tool_choice: { type: "tool", name: "respond" },
            tools: [
              {
                name: "respond",
                description: "Store the abbreviation line for the e-paper header",
                input_schema: {
                  type: "object",
                  properties: {
                    summary: {
                      type: "string",
                      description: "One line of abbreviations, e.g. 'STND / DRG PPR / RUN'",
                    },
                  },
                  required: ["summary"],
                },
              },
            ],
          }),
        })
      );

      if (!response.body) throw new Error("empty response body");
      const summary = parseBlurbResponse(response.body);
      return summary === "" ? null : summary;
    } catch (error) {
      throw new ProviderFetchError(this.name, error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }
  }
}
