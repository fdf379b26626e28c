import { Injectable, Logger } from "@nestjs/common";
import { ClinicalTrialsClient } from "./clinical-trials.client";
import { normalizeLocation } from "./location-normalizer";
import { Trial, TrialSearchResult } from "./trial.types";
import { UpstreamError } from "./upstream.errors";

type Attempt = { ok: true; trials: Trial[] } | { ok: false; error: UpstreamError };

/**
 * Two-step trial search: a location-scoped attempt, then one nationwide
 * attempt when the local one comes back empty or fails. Never throws for
 * upstream problems; total failure is reported as `degraded`.
 */
@Injectable()
export class TrialSearchService {
  private readonly logger = new Logger(TrialSearchService.name);

  constructor(private readonly client: ClinicalTrialsClient) {}

  async search(cancerType: string, location?: string): Promise<TrialSearchResult> {
    const normalized = location?.trim() ? normalizeLocation(location) : undefined;

    const local = await this.attempt(cancerType, normalized, false);
    if (local.ok && local.trials.length > 0) {
      return { trials: local.trials, degraded: false, isNationwide: false, location: normalized };
    }

    if (!normalized) {
      return { trials: [], degraded: !local.ok, isNationwide: false };
    }

    this.logger.log(
      `No local trials for "${cancerType}" near "${normalized}" (${local.ok ? "empty" : local.error.kind}); searching nationwide`
    );
    const nationwide = await this.attempt(cancerType, undefined, true);
    if (nationwide.ok) {
      return {
        trials: nationwide.trials,
        degraded: false,
        isNationwide: nationwide.trials.length > 0,
        location: normalized
      };
    }

    // Nationwide coverage is unknown, so a genuine zero-match cannot be claimed
    return { trials: [], degraded: true, isNationwide: false, location: normalized };
  }

  private async attempt(condition: string, location: string | undefined, isNationwide: boolean): Promise<Attempt> {
    try {
      const trials = await this.client.fetchStudies({ condition, location }, isNationwide);
      return { ok: true, trials };
    } catch (error) {
      if (!(error instanceof UpstreamError)) throw error;
      this.logger.warn(`${isNationwide ? "Nationwide" : "Local"} trial search failed: ${error.message}`);
      return { ok: false, error };
    }
  }
}
