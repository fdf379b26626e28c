import { Injectable, Logger } from "@nestjs/common";
import { z } from "zod";
import { LlmService } from "../llm/llm.service";
import { Intent, IntentContext, IntentResolver, IntentResult, INTENTS } from "./nlp.types";

const classificationSchema = z.object({
  label: z.string(),
  confidence: z.coerce.number().min(0).max(1).optional()
});

const INTENT_PROMPT = `You classify messages sent to a clinical trial search assistant.
Reply with JSON only: {"label": <label>, "confidence": <number between 0 and 1>}.
Labels:
- "greeting": the user says hello or opens the conversation
- "find_trials": the user asks to find, search, or list clinical trials, or gives details for a search
- "goodbye": the user ends the conversation or says farewell
- "unknown": anything else`;

/**
 * Gemini-backed classifier. The model label maps straight onto the intent
 * enum; confidence is reported but not acted on.
 */
@Injectable()
export class ModelIntentResolver implements IntentResolver {
  private readonly logger = new Logger(ModelIntentResolver.name);

  constructor(private readonly llm: LlmService) {}

  async classify(text: string, context: IntentContext): Promise<IntentResult> {
    try {
      const raw = await this.llm.generateJson(`${INTENT_PROMPT}\n\nMessage: ${JSON.stringify(text)}`);
      const parsed = classificationSchema.parse(raw);
      return {
        intent: toIntent(parsed.label),
        confidence: toConfidenceBand(parsed.confidence)
      };
    } catch (error) {
      this.logger.warn(`Intent model failed, using default intent: ${error instanceof Error ? error.message : String(error)}`);
      return { intent: context.intakeComplete ? "find_trials" : "unknown", confidence: "low" };
    }
  }
}

function toIntent(label: string): Intent {
  const normalized = label.trim().toLowerCase();
  return INTENTS.find((intent) => intent === normalized) ?? "unknown";
}

function toConfidenceBand(score: number | undefined): IntentResult["confidence"] {
  if (score === undefined) return "medium";
  if (score >= 0.8) return "high";
  if (score >= 0.5) return "medium";
  return "low";
}
