// impactscore-backend/src/routes/competencies.ts

import { Router, Request, Response } from "express";
import { parseISO } from "date-fns";
import { ScoringPolicy } from "../types/scoring";
import { competencyRequestSchema, describeIssues } from "../schemas/requests";
import { buildCompetencyReport } from "../services/report";

export function createCompetencyRouter(policy: ScoringPolicy): Router {
  const router = Router();

  router.post("/", (req: Request, res: Response) => {
    const startTime = Date.now();
    console.log(`[${new Date().toISOString()}] POST /api/competencies - Start`);

    const parsed = competencyRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        ok: false,
        error: `Invalid request: ${describeIssues(parsed.error)}`,
      });
    }
    const body = parsed.data;

    if (!body.scores?.length && !body.evidence?.length) {
      return res.status(400).json({
        ok: false,
        error: "Either scores or evidence is required",
      });
    }

    const report = buildCompetencyReport(
      {
        scores: body.scores,
        evidence: body.evidence,
        months_in_role: body.months_in_role,
        level: body.level,
        now: body.now ? parseISO(body.now) : new Date(),
      },
      policy
    );

    const duration = Date.now() - startTime;
    console.log(`[${new Date().toISOString()}] POST /api/competencies - Completed in ${duration}ms`);

    return res.json({ ok: true, report });
  });

  return router;
}
