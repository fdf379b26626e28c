/**
 * Fixed reply texts for the conversation engine.
 * Trial replies always state the cancer type and location searched, and say
 * plainly when results are nationwide or the registry could not be reached.
 */

import { TrialSearchResult } from "../trials/trial.types";

export interface SearchCriteria {
  cancerType: string;
  location?: string;
}

export class ResponseTemplates {
  static readonly REQUIRES_INTAKE = "Please complete the intake form before proceeding.";

  static readonly GREETING = "Hello! I can help you find clinical trials. Ask me to search whenever you're ready.";

  static readonly GOODBYE = "Goodbye! Feel free to return anytime you need help finding clinical trials.";

  static readonly CLARIFY = "Could you clarify your request? For example, ask me to find trials for your cancer type near you.";

  static readonly CONVERSATION_ENDED =
    "Our conversation has ended. Start a new session whenever you'd like to search again.";

  static readonly REGISTRY_UNAVAILABLE =
    "I'm having trouble reaching the clinical trials registry right now. Please try again in a few minutes.";

  static intakeAcknowledged(cancerType: string, location: string): string {
    return `Thank you! Your intake has been recorded for ${cancerType} in ${location}. Ask me to find clinical trials whenever you're ready.`;
  }

  static trialResults(criteria: SearchCriteria, result: TrialSearchResult): string {
    if (result.degraded) {
      return this.REGISTRY_UNAVAILABLE;
    }

    const count = result.trials.length;
    const location = result.location ?? criteria.location;

    if (count === 0) {
      return location
        ? `I couldn't find any recruiting ${criteria.cancerType} trials near ${location} or nationwide right now.`
        : `I couldn't find any recruiting ${criteria.cancerType} trials right now.`;
    }

    if (result.isNationwide) {
      return `I couldn't find trials for ${criteria.cancerType} near ${location}, but here ${count === 1 ? "is" : "are"} ${count} recruiting ${plural(count)} nationwide:`;
    }

    return location
      ? `Here ${count === 1 ? "is" : "are"} ${count} recruiting ${criteria.cancerType} clinical ${plural(count)} near ${location}:`
      : `Here ${count === 1 ? "is" : "are"} ${count} recruiting ${criteria.cancerType} clinical ${plural(count)}:`;
  }
}

function plural(count: number): string {
  return count === 1 ? "trial" : "trials";
}
