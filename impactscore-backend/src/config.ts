// impactscore-backend/src/config.ts

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ScoringPolicy } from "./types/scoring";
import { ScoreBandConfigError } from "./types/errors";
import {
  loadBundledPolicies,
  parsePolicyCatalog,
  PolicyCatalog,
  selectPolicy,
} from "./services/policy";

const DEFAULT_ORIGINS = ["http://localhost:3000"];

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.string().default("development"),
  ALLOWED_ORIGINS: z.string().optional(),
  SCORING_POLICY: z.string().optional(),
  SCORING_POLICY_FILE: z.string().optional(),
});

export interface AppConfig {
  port: number;
  nodeEnv: string;
  allowedOrigins: string[];
  policies: PolicyCatalog;
  policy: ScoringPolicy;
}

function readPolicyFile(file: string): PolicyCatalog {
  const resolved = path.resolve(file);
  let contents: unknown;
  try {
    contents = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (err) {
    throw new ScoreBandConfigError(
      `Cannot read scoring policy file ${resolved}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parsePolicyCatalog(contents);
}

/**
 * Reads the environment (already populated by dotenv) and resolves the
 * active scoring policy. Throws on anything that would misscore.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${detail}`);
  }
  const vars = parsed.data;

  const allowedOrigins = vars.ALLOWED_ORIGINS
    ? vars.ALLOWED_ORIGINS.split(",").map((origin) => origin.trim()).filter(Boolean)
    : DEFAULT_ORIGINS;

  const policies = vars.SCORING_POLICY_FILE
    ? readPolicyFile(vars.SCORING_POLICY_FILE)
    : loadBundledPolicies();

  return {
    port: vars.PORT,
    nodeEnv: vars.NODE_ENV,
    allowedOrigins: allowedOrigins.length > 0 ? allowedOrigins : DEFAULT_ORIGINS,
    policies,
    policy: selectPolicy(policies, vars.SCORING_POLICY || undefined),
  };
}
