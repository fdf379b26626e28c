import { Sex } from "../sessions/session.types";

export const INTENTS = ["greeting", "find_trials", "goodbye", "unknown"] as const;

export type Intent = (typeof INTENTS)[number];

export interface IntentResult {
  intent: Intent;
  confidence: "high" | "medium" | "low";
}

export interface IntentContext {
  intakeComplete: boolean;
}

export interface IntentResolver {
  classify(text: string, context: IntentContext): Promise<IntentResult>;
}

export interface ExtractedEntities {
  cancerType?: string;
  location?: string;
  age?: number;
  sex?: Sex;
}

export interface EntityExtractor {
  extract(text: string): Promise<ExtractedEntities>;
}

export const INTENT_RESOLVER = Symbol("INTENT_RESOLVER");
export const ENTITY_EXTRACTOR = Symbol("ENTITY_EXTRACTOR");
