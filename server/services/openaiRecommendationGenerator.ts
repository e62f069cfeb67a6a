/**
 * OpenAI recommendation generator
 *
 * Asks the chat model for structured treatment advice as a JSON object,
 * validates the reply and renders it as plain text for growers and reviewers.
 * Any problem (no reply, malformed JSON, wrong shape) is thrown so the
 * RecommendationAdapter can substitute its template.
 */

import OpenAI from "openai";
import { z } from "zod";
import type { RecommendationContext, RecommendationGenerator } from "./recommendationAdapter";

export interface CompletionRequest {
  system: string;
  user: string;
}

/**
 * One chat completion in JSON mode; resolves to the raw message text.
 */
export type CompletionFn = (request: CompletionRequest, signal: AbortSignal) => Promise<string | null>;

const adviceSchema = z.object({
  summary: z.string().trim().min(1),
  immediateActions: z.array(z.string().trim().min(1)).default([]),
  organicTreatments: z.array(z.string().trim().min(1)).default([]),
  chemicalTreatments: z.array(z.string().trim().min(1)).default([]),
  prevention: z.array(z.string().trim().min(1)).default([]),
  whenToSeekHelp: z.string().trim().optional(),
});

export type TreatmentAdvice = z.infer<typeof adviceSchema>;

const SYSTEM_PROMPT = `You are an agricultural plant pathology assistant helping smallholder farmers treat crop diseases.

Your role is to:
1. Explain the detected condition in plain language
2. Recommend practical treatments available to small farms
3. Prefer organic and cultural controls, listing chemical options separately
4. Say clearly when the grower should contact an agricultural extension officer

Respond in JSON format:
{
  "summary": "one or two sentences about the condition and its urgency",
  "immediateActions": ["steps to take within the next 48 hours"],
  "organicTreatments": ["organic or cultural treatments"],
  "chemicalTreatments": ["chemical treatments with active ingredient names"],
  "prevention": ["practices that prevent recurrence"],
  "whenToSeekHelp": "when to contact an expert"
}`;

function buildUserPrompt(context: RecommendationContext): string {
  return `Crop: ${context.cropType}
Detected condition: ${context.disease}
Severity: ${context.severity}
Model confidence: ${Math.round(context.averageConfidence * 100)}%

Provide treatment and prevention advice for this grower.`;
}

function section(title: string, items: string[]): string | null {
  if (items.length === 0) return null;
  return `${title}:\n${items.map(item => `- ${item}`).join("\n")}`;
}

export function renderAdvice(advice: TreatmentAdvice): string {
  const parts = [
    advice.summary,
    section("Immediate actions", advice.immediateActions),
    section("Organic treatments", advice.organicTreatments),
    section("Chemical treatments", advice.chemicalTreatments),
    section("Prevention", advice.prevention),
    advice.whenToSeekHelp ? `When to seek expert help: ${advice.whenToSeekHelp}` : null,
  ];
  return parts.filter((part): part is string => part !== null).join("\n\n");
}

export function parseAdvice(raw: string): TreatmentAdvice {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error("Recommendation model returned invalid JSON");
  }

  const parsed = adviceSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.errors.map(issue => issue.path.join(".") || "(root)").join(", ");
    throw new Error(`Recommendation model reply is missing or has invalid fields: ${fields}`);
  }
  return parsed.data;
}

export class OpenAIRecommendationGenerator implements RecommendationGenerator {
  constructor(private readonly complete: CompletionFn) {}

  async generate(context: RecommendationContext, signal: AbortSignal): Promise<string> {
    const reply = await this.complete({ system: SYSTEM_PROMPT, user: buildUserPrompt(context) }, signal);
    if (!reply) {
      throw new Error("No response from recommendation model");
    }
    return renderAdvice(parseAdvice(reply));
  }
}

export function openAICompletion(client: OpenAI, model: string): CompletionFn {
  return async (request, signal) => {
    const completion = await client.chat.completions.create(
      {
        model,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
        response_format: { type: "json_object" },
        temperature: 0.3,
      },
      { signal },
    );
    return completion.choices[0]?.message?.content ?? null;
  };
}

/**
 * Null when no API key is configured; the adapter then always uses its template.
 */
export function createOpenAIRecommendationGenerator(options: {
  apiKey?: string;
  model: string;
}): OpenAIRecommendationGenerator | null {
  if (!options.apiKey) return null;
  const client = new OpenAI({ apiKey: options.apiKey });
  return new OpenAIRecommendationGenerator(openAICompletion(client, options.model));
}
