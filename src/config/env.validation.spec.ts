import { envSchema } from "./env.validation";

describe("envSchema", () => {
  it("fills defaults for an empty environment", () => {
    expect(envSchema.parse({})).toEqual({
      CLINICALTRIALS_API_BASE: "https://clinicaltrials.gov/api/v2",
      TRIAL_SEARCH_TIMEOUT_MS: 10000,
      NLP_MODE: "heuristic",
      GEMINI_MODEL: "gemini-1.5-flash",
      LLM_TIMEOUT_MS: 8000
    });
  });

  it("coerces numeric strings", () => {
    const env = envSchema.parse({ TRIAL_SEARCH_TIMEOUT_MS: "2500", PORT: "8080", RATE_LIMIT_REQ_PER_TTL: "5" });
    expect(env.TRIAL_SEARCH_TIMEOUT_MS).toBe(2500);
    expect(env.PORT).toBe(8080);
    expect(env.RATE_LIMIT_REQ_PER_TTL).toBe(5);
  });

  it("rejects an unknown NLP mode and a non-URL registry base", () => {
    expect(() => envSchema.parse({ NLP_MODE: "magic" })).toThrow();
    expect(() => envSchema.parse({ CLINICALTRIALS_API_BASE: "not a url" })).toThrow();
  });
});
