export interface TrialContact {
  name?: string;
  phone?: string;
  email?: string;
}

export interface Trial {
  nctId: string;
  title: string;
  phase: string;
  status: string;
  location: string;
  facility: string;
  sponsor: string;
  contact?: TrialContact;
  link: string;
  isNationwide: boolean;
}

export interface StudyQuery {
  condition: string;
  location?: string;
}

export interface TrialSearchResult {
  trials: Trial[];
  /** True when every registry attempt failed, as opposed to a genuine zero-match. */
  degraded: boolean;
  isNationwide: boolean;
  /** Normalized location used for the local attempt, if any. */
  location?: string;
}

export const PAGE_SIZE = 10;
export const RECRUITING_STATUS = "RECRUITING";
