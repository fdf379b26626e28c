import { z } from "zod";
export const envSchema = z.object({
  CLINICALTRIALS_API_BASE: z.string().url().default("https://clinicaltrials.gov/api/v2"),
  TRIAL_SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  NLP_MODE: z.enum(["heuristic", "model"]).default("heuristic"),
  GEMINI_API_KEY: z.string().min(1).optional(), // Only read when NLP_MODE=model
  GEMINI_MODEL: z.string().min(1).default("gemini-1.5-flash"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  PORT: z.coerce.number().optional(),
  RATE_LIMIT_TTL_SEC: z.coerce.number().optional(),
  RATE_LIMIT_REQ_PER_TTL: z.coerce.number().optional(),
  NODE_ENV: z.string().optional()
});

export type Env = z.infer<typeof envSchema>;
