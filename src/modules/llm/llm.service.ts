import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { GenerativeModel, GoogleGenerativeAI } from "@google/generative-ai";

export class LlmUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LlmUnavailableError";
  }
}

@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);
  private readonly model?: GenerativeModel;

  constructor(private readonly configService: ConfigService) {
    const apiKey = this.configService.get<string>("GEMINI_API_KEY");
    if (!apiKey) {
      this.logger.log("GEMINI_API_KEY not set; model-backed NLP is unavailable");
      return;
    }
    const modelName = this.configService.get<string>("GEMINI_MODEL") ?? "gemini-1.5-flash";
    const timeout = this.configService.get<number>("LLM_TIMEOUT_MS") ?? 8000;
    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel(
      { model: modelName, generationConfig: { responseMimeType: "application/json", temperature: 0 } },
      { timeout }
    );
  }

  isConfigured(): boolean {
    return this.model !== undefined;
  }

  /**
   * Runs a JSON-mode prompt and returns the parsed body.
   * @throws LlmUnavailableError when no key is configured, the call fails, or the reply is not JSON
   */
  async generateJson(prompt: string): Promise<unknown> {
    if (!this.model) {
      throw new LlmUnavailableError("Gemini is not configured");
    }

    let text: string;
    try {
      const result = await this.model.generateContent(prompt);
      text = result.response.text();
    } catch (error) {
      throw new LlmUnavailableError(`Gemini request failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!text || text.trim().length === 0) {
      throw new LlmUnavailableError("Empty response from Gemini");
    }

    try {
      const parsed: unknown = JSON.parse(stripCodeFence(text));
      return parsed;
    } catch {
      throw new LlmUnavailableError("Gemini response was not valid JSON");
    }
  }
}

// Gemini occasionally wraps JSON mode output in a ```json fence
function stripCodeFence(text: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/.exec(text.trim());
  return fenced ? fenced[1] : text;
}
