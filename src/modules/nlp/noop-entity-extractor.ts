import { Injectable } from "@nestjs/common";
import { EntityExtractor, ExtractedEntities } from "./nlp.types";

/** Used when no model is configured: every field stays absent, so the intake wins. */
@Injectable()
export class NoopEntityExtractor implements EntityExtractor {
  async extract(_text: string): Promise<ExtractedEntities> {
    return {};
  }
}
