import { z } from "zod";
import { Trial, TrialContact } from "./trial.types";
import { UpstreamParseError } from "./upstream.errors";

// ============================================================================
// Registry response shapes (ClinicalTrials.gov API v2). Only the fields we
// read are declared; everything else is ignored.
// ============================================================================

const contactSchema = z.object({
  name: z.string().optional(),
  phone: z.string().optional(),
  email: z.string().optional()
});

const siteSchema = z.object({
  facility: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  contacts: z.array(contactSchema).optional()
});

const studySchema = z.object({
  protocolSection: z.object({
    identificationModule: z.object({
      nctId: z.string().min(1),
      briefTitle: z.string().optional(),
      officialTitle: z.string().optional()
    }),
    statusModule: z.object({ overallStatus: z.string().optional() }).optional(),
    designModule: z.object({ phases: z.array(z.string()).optional() }).optional(),
    contactsLocationsModule: z.object({ locations: z.array(siteSchema).optional() }).optional(),
    sponsorCollaboratorsModule: z
      .object({ leadSponsor: z.object({ name: z.string().optional() }).optional() })
      .optional()
  })
});

export const studiesPageSchema = z.object({
  studies: z.array(z.unknown()).default([]),
  nextPageToken: z.string().optional()
});

export type StudiesPage = z.infer<typeof studiesPageSchema>;

export const STUDY_LINK_BASE = "https://clinicaltrials.gov/study/";

/**
 * Maps one raw study record to a Trial.
 * @param requestedLocation Display fallback when the study lists no sites
 * @throws UpstreamParseError when the record lacks an NCT ID or a title
 */
export function parseStudy(raw: unknown, requestedLocation: string | undefined, isNationwide: boolean): Trial {
  const parsed = studySchema.safeParse(raw);
  if (!parsed.success) {
    throw new UpstreamParseError(`Malformed study record: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
  }

  const protocol = parsed.data.protocolSection;
  const identification = protocol.identificationModule;
  const title = identification.briefTitle?.trim() || identification.officialTitle?.trim();
  if (!title) {
    throw new UpstreamParseError(`Study ${identification.nctId} has no title`);
  }

  const firstSite = protocol.contactsLocationsModule?.locations?.[0];
  const siteLocation = firstSite?.city && firstSite.state ? `${firstSite.city}, ${firstSite.state}` : undefined;

  const trial: Trial = {
    nctId: identification.nctId,
    title,
    phase: formatPhase(protocol.designModule?.phases?.[0]),
    status: formatStatus(protocol.statusModule?.overallStatus),
    location: siteLocation ?? requestedLocation ?? "United States",
    facility: firstSite?.facility ?? "Multiple Sites",
    sponsor: protocol.sponsorCollaboratorsModule?.leadSponsor?.name ?? "Unknown Sponsor",
    link: `${STUDY_LINK_BASE}${identification.nctId}`,
    isNationwide
  };

  const contact = toContact(firstSite?.contacts?.[0]);
  if (contact) {
    trial.contact = contact;
  }
  return trial;
}

/** "PHASE2" -> "Phase 2", "EARLY_PHASE1" -> "Early Phase 1" */
export function formatPhase(phase: string | undefined): string {
  if (!phase) {
    return "Not Specified";
  }
  if (phase === "NA") {
    return "Not Applicable";
  }
  return titleCase(phase.replace(/PHASE(\d)/g, "PHASE $1"));
}

/** "ACTIVE_NOT_RECRUITING" -> "Active Not Recruiting" */
export function formatStatus(status: string | undefined): string {
  return status ? titleCase(status) : "Unknown";
}

function titleCase(value: string): string {
  return value
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

function toContact(raw: z.infer<typeof contactSchema> | undefined): TrialContact | undefined {
  if (!raw || (!raw.name && !raw.phone && !raw.email)) {
    return undefined;
  }
  const contact: TrialContact = {};
  if (raw.name) contact.name = raw.name;
  if (raw.phone) contact.phone = raw.phone;
  if (raw.email) contact.email = raw.email;
  return contact;
}
