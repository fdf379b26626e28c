import { Trial } from "../trials/trial.types";

export type SessionState = "NEW" | "INTAKE_COMPLETE" | "ENDED";

export type Sex = "female" | "male" | "other";

export const SEX_VALUES: readonly Sex[] = ["female", "male", "other"];

export interface PatientIntake {
  userId: string;
  cancerType: string;
  stage: string;
  age: number;
  sex: Sex;
  location: string;
  comorbidities: string[];
  priorTreatments: string[];
}

export interface Turn {
  role: "user" | "bot";
  text: string;
  timestamp: string;
  trials?: Trial[];
}

export interface Session {
  userId: string;
  intake?: PatientIntake;
  turns: Turn[];
  state: SessionState;
  createdAt: string;
  updatedAt: string;
}

export class SessionNotFoundError extends Error {
  constructor(readonly userId: string) {
    super(`No session for user ${userId}`);
    this.name = "SessionNotFoundError";
  }
}

export class IntakeValidationError extends Error {
  constructor(readonly field: keyof PatientIntake, reason: string) {
    super(`Invalid intake field ${field}: ${reason}`);
    this.name = "IntakeValidationError";
  }
}
