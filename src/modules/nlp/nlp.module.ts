import { Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { LlmModule } from "../llm/llm.module";
import { LlmService } from "../llm/llm.service";
import { HeuristicIntentResolver } from "./heuristic-intent-resolver";
import { ModelEntityExtractor } from "./model-entity-extractor";
import { ModelIntentResolver } from "./model-intent-resolver";
import { ENTITY_EXTRACTOR, EntityExtractor, INTENT_RESOLVER, IntentResolver } from "./nlp.types";
import { NoopEntityExtractor } from "./noop-entity-extractor";

export type NlpBackend = "model" | "heuristic";

export const NLP_BACKEND = Symbol("NLP_BACKEND");

const logger = new Logger("NlpModule");

/** Decided once at startup; both NLP providers follow the same choice. */
export function selectNlpBackend(cfg: ConfigService, llm: LlmService): NlpBackend {
  if (cfg.get<string>("NLP_MODE") !== "model") {
    logger.log("Using heuristic intent resolver and no-op entity extractor");
    return "heuristic";
  }
  if (!llm.isConfigured()) {
    logger.warn("NLP_MODE=model but GEMINI_API_KEY is missing; falling back to heuristic NLP");
    return "heuristic";
  }
  logger.log("Using Gemini-backed intent resolver and entity extractor");
  return "model";
}

@Module({
  imports: [LlmModule],
  providers: [
    { provide: NLP_BACKEND, inject: [ConfigService, LlmService], useFactory: selectNlpBackend },
    {
      provide: INTENT_RESOLVER,
      inject: [NLP_BACKEND, LlmService],
      useFactory: (backend: NlpBackend, llm: LlmService): IntentResolver =>
        backend === "model" ? new ModelIntentResolver(llm) : new HeuristicIntentResolver()
    },
    {
      provide: ENTITY_EXTRACTOR,
      inject: [NLP_BACKEND, LlmService],
      useFactory: (backend: NlpBackend, llm: LlmService): EntityExtractor =>
        backend === "model" ? new ModelEntityExtractor(llm) : new NoopEntityExtractor()
    }
  ],
  exports: [INTENT_RESOLVER, ENTITY_EXTRACTOR]
})
export class NlpModule {}
