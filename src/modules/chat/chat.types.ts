import { Trial, TrialContact } from "../trials/trial.types";

// Wire shapes returned by the chat endpoints (snake_case, as clients expect)

export interface TrialView {
  nct_id: string;
  title: string;
  phase: string;
  status: string;
  location: string;
  facility: string;
  sponsor: string;
  contact?: TrialContact;
  link: string;
  is_nationwide: boolean;
}

export interface IntakeResponse {
  response: string;
  intake_complete: true;
}

export interface MessageResponse {
  response: string;
  trials?: TrialView[];
  degraded?: boolean;
  requires_intake?: true;
}

export interface EndSessionResponse {
  status: "session_cleared";
}

export function toTrialView(trial: Trial): TrialView {
  const view: TrialView = {
    nct_id: trial.nctId,
    title: trial.title,
    phase: trial.phase,
    status: trial.status,
    location: trial.location,
    facility: trial.facility,
    sponsor: trial.sponsor,
    link: trial.link,
    is_nationwide: trial.isNationwide
  };
  if (trial.contact) {
    view.contact = { ...trial.contact };
  }
  return view;
}
