import { IntakeValidationError, PatientIntake, SEX_VALUES } from "./session.types";

/** Enforces the fields an INTAKE_COMPLETE session relies on. */
export function assertValidIntake(intake: PatientIntake): void {
  if (!intake.userId.trim()) {
    throw new IntakeValidationError("userId", "must not be empty");
  }
  if (!intake.cancerType.trim()) {
    throw new IntakeValidationError("cancerType", "must not be empty");
  }
  if (!intake.location.trim()) {
    throw new IntakeValidationError("location", "must not be empty");
  }
  if (!Number.isInteger(intake.age) || intake.age < 0) {
    throw new IntakeValidationError("age", "must be a non-negative integer");
  }
  if (!SEX_VALUES.includes(intake.sex)) {
    throw new IntakeValidationError("sex", `must be one of ${SEX_VALUES.join(", ")}`);
  }
}
