import { Injectable } from "@nestjs/common";
import { GreetingDetector } from "./greeting-detector";
import { IntentContext, IntentResolver, IntentResult } from "./nlp.types";

/**
 * Keyword fallback. Fixed priority when keyword sets overlap:
 * greeting > goodbye > find_trials (intake complete) > unknown.
 */
@Injectable()
export class HeuristicIntentResolver implements IntentResolver {
  async classify(text: string, context: IntentContext): Promise<IntentResult> {
    if (GreetingDetector.isGreeting(text)) {
      return { intent: "greeting", confidence: "low" };
    }
    if (GreetingDetector.isGoodbye(text)) {
      return { intent: "goodbye", confidence: "low" };
    }
    return { intent: context.intakeComplete ? "find_trials" : "unknown", confidence: "low" };
  }
}
