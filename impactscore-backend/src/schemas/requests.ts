// impactscore-backend/src/schemas/requests.ts

import { z } from "zod";
import { OWNERSHIP_SIGNALS } from "../types/scoring";

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

export const keyResultSchema = z.object({
  description: z.string().min(1),
  target: z.number().finite().optional(),
  achieved: z.number().finite().optional(),
});

// Missing title/description is tolerated here: the engine scores such a
// goal as malformed instead of rejecting it.
export const goalSchema = z.object({
  id: z.string().min(1),
  title: z.string().nullish().transform((v) => v ?? ""),
  description: z.string().nullish().transform((v) => v ?? ""),
  key_results: z.array(keyResultSchema).default([]),
});

export const evidenceItemSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  body: z.string().optional(),
  timestamp: z.string().regex(ISO_DATE_PREFIX, "must start with YYYY-MM-DD"),
  kind: z.enum(["change", "document", "issue", "review"]).optional(),
  ownership_signals: z.array(z.enum(OWNERSHIP_SIGNALS)).optional(),
  magnitude: z.number().optional(),
});

export const nowSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "must be YYYY-MM-DD")
  .optional();

// Goals and evidence stay loosely typed here; each entry is validated on
// its own so one bad record cannot sink the request.
export const alignmentRequestSchema = z.object({
  goals: z.array(z.unknown()).min(1),
  evidence: z.array(z.unknown()).default([]),
  months_in_role: z.number().nullable().optional(),
  exceptional_initiative: z.boolean().optional(),
  range: z.string().optional(),
  now: nowSchema,
});

export const competencyRequestSchema = z.object({
  scores: z
    .array(
      z.object({
        competency_id: z.string().min(1),
        raw_score: z.number().finite(),
        has_ownership: z.boolean().default(false),
      })
    )
    .optional(),
  evidence: z.array(evidenceItemSchema).optional(),
  months_in_role: z.number().nullable().optional(),
  level: z.enum(["P2", "P3", "P4", "P5"]).optional(),
  now: nowSchema,
});

export type AlignmentRequestBody = z.infer<typeof alignmentRequestSchema>;
export type CompetencyRequestBody = z.infer<typeof competencyRequestSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(body)"}: ${issue.message}`)
    .join("; ");
}
