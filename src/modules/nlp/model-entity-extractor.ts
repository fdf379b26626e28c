import { Injectable, Logger } from "@nestjs/common";
import { z } from "zod";
import { LlmService } from "../llm/llm.service";
import { SEX_VALUES, Sex } from "../sessions/session.types";
import { EntityExtractor, ExtractedEntities } from "./nlp.types";

const nullableText = z.string().nullish();

const entitiesSchema = z.object({
  cancer_type: nullableText,
  location: nullableText,
  age: z.union([z.number(), z.string()]).nullish(),
  sex: nullableText
});

const ENTITY_PROMPT = `Extract patient details from a message sent to a clinical trial search assistant.
Reply with JSON only: {"cancer_type": string|null, "location": string|null, "age": integer|null, "sex": "female"|"male"|"other"|null}.
- cancer_type: the cancer named in the message, e.g. "breast cancer"
- location: the city and/or US state named in the message, as written
- Use null for anything the message does not state. Do not guess.`;

@Injectable()
export class ModelEntityExtractor implements EntityExtractor {
  private readonly logger = new Logger(ModelEntityExtractor.name);

  constructor(private readonly llm: LlmService) {}

  async extract(text: string): Promise<ExtractedEntities> {
    try {
      const raw = await this.llm.generateJson(`${ENTITY_PROMPT}\n\nMessage: ${JSON.stringify(text)}`);
      return toEntities(entitiesSchema.parse(raw));
    } catch (error) {
      this.logger.warn(`Entity model failed, extracting nothing: ${error instanceof Error ? error.message : String(error)}`);
      return {};
    }
  }
}

function toEntities(parsed: z.infer<typeof entitiesSchema>): ExtractedEntities {
  const entities: ExtractedEntities = {};

  const cancerType = parsed.cancer_type?.trim();
  if (cancerType) entities.cancerType = cancerType;

  const location = parsed.location?.trim();
  if (location) entities.location = location;

  const age = typeof parsed.age === "string" ? Number.parseInt(parsed.age, 10) : parsed.age;
  if (typeof age === "number" && Number.isInteger(age) && age >= 0) entities.age = age;

  const sex = toSex(parsed.sex);
  if (sex) entities.sex = sex;

  return entities;
}

function toSex(value: string | null | undefined): Sex | undefined {
  const normalized = value?.trim().toLowerCase();
  return SEX_VALUES.find((sex) => sex === normalized);
}
