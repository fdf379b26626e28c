import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import axios, { AxiosInstance } from "axios";
import { PAGE_SIZE, RECRUITING_STATUS, StudyQuery, Trial } from "./trial.types";
import { parseStudy, studiesPageSchema } from "./study-parser";
import { UpstreamError, UpstreamParseError, UpstreamTimeoutError, UpstreamUnavailableError } from "./upstream.errors";

export const REGISTRY_HTTP = Symbol("REGISTRY_HTTP");

export function createRegistryHttp(cfg: ConfigService): AxiosInstance {
  const baseURL = (cfg.get<string>("CLINICALTRIALS_API_BASE") ?? "https://clinicaltrials.gov/api/v2").replace(/\/$/, ""); // Remove trailing slash
  return axios.create({
    baseURL,
    headers: { Accept: "application/json" },
    timeout: cfg.get<number>("TRIAL_SEARCH_TIMEOUT_MS") ?? 10000
  });
}

/**
 * Thin client for the registry's `GET /studies` endpoint.
 * One call is one attempt: no retries here, fallback policy lives in TrialSearchService.
 */
@Injectable()
export class ClinicalTrialsClient {
  private readonly logger = new Logger(ClinicalTrialsClient.name);
  private readonly timeoutMs: number;

  constructor(
    @Inject(REGISTRY_HTTP) private readonly http: AxiosInstance,
    configService: ConfigService
  ) {
    this.timeoutMs = configService.get<number>("TRIAL_SEARCH_TIMEOUT_MS") ?? 10000;
  }

  /**
   * @throws UpstreamTimeoutError, UpstreamUnavailableError, or UpstreamParseError for an unreadable page
   */
  async fetchStudies(query: StudyQuery, isNationwide: boolean): Promise<Trial[]> {
    const params: Record<string, string | number> = {
      "query.cond": query.condition,
      "filter.overallStatus": RECRUITING_STATUS,
      pageSize: PAGE_SIZE,
      format: "json"
    };
    if (query.location) {
      params["query.locn"] = query.location;
    }

    this.logger.debug(`GET /studies ${JSON.stringify(params)}`);

    let body: unknown;
    try {
      const response = await this.http.get<unknown>("/studies", {
        params,
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      body = response.data;
    } catch (error) {
      throw this.toUpstreamError(error);
    }

    const page = studiesPageSchema.safeParse(body);
    if (!page.success) {
      throw new UpstreamParseError("Registry response is not a studies page");
    }

    const trials: Trial[] = [];
    for (const raw of page.data.studies) {
      if (trials.length >= PAGE_SIZE) break;
      try {
        trials.push(parseStudy(raw, query.location, isNationwide));
      } catch (error) {
        if (!(error instanceof UpstreamParseError)) throw error;
        this.logger.debug(`Skipping study: ${error.message}`);
      }
    }
    return trials;
  }

  private toUpstreamError(error: unknown): UpstreamError {
    if (axios.isAxiosError(error)) {
      const isTimeout =
        error.code === "ECONNABORTED" || // Timeout
        error.code === "ETIMEDOUT" ||
        error.code === "ERR_CANCELED"; // AbortSignal fired
      if (isTimeout) {
        return new UpstreamTimeoutError(this.timeoutMs);
      }
      const status = error.response?.status;
      return new UpstreamUnavailableError(
        status ? `Registry responded with HTTP ${status}` : `Registry request failed: ${error.message}`,
        status
      );
    }
    if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
      return new UpstreamTimeoutError(this.timeoutMs);
    }
    return new UpstreamUnavailableError(`Registry request failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}
