import { ExtractedEntities } from "../nlp/nlp.types";
import { PatientIntake, Sex } from "../sessions/session.types";
import { qualifyWithState } from "../trials/location-normalizer";

export interface MergedCriteria {
  cancerType: string;
  location: string;
  age: number;
  sex: Sex;
}

/**
 * Per-field merge of message entities over the intake: an extracted value
 * wins when present, otherwise the intake value is kept.
 * A city-only location from the message borrows the intake's state when the
 * intake location is just a state.
 */
export function mergeSearchCriteria(intake: PatientIntake, entities: ExtractedEntities): MergedCriteria {
  const extractedLocation = nonEmpty(entities.location);
  return {
    cancerType: nonEmpty(entities.cancerType) ?? intake.cancerType,
    location: extractedLocation ? qualifyWithState(extractedLocation, intake.location) : intake.location,
    age: entities.age ?? intake.age,
    sex: entities.sex ?? intake.sex
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
