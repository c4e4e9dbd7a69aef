// impactscore-backend/src/routes/alignment.ts

import { Router, Request, Response } from "express";
import { parseISO } from "date-fns";
import { EvidenceItem, ScoringPolicy } from "../types/scoring";
import { InvalidRangeError } from "../types/errors";
import {
  alignmentRequestSchema,
  describeIssues,
  evidenceItemSchema,
  goalSchema,
} from "../schemas/requests";
import { DateRange, isWithinRange, resolveDateRange } from "../services/dateRange";
import { buildAlignmentReport, GoalEntry } from "../services/report";

function goalIdOf(raw: unknown, index: number): string {
  if (typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string" && raw.id) {
    return raw.id;
  }
  return `goal-${index + 1}`;
}

export function createAlignmentRouter(policy: ScoringPolicy): Router {
  const router = Router();

  router.post("/", (req: Request, res: Response) => {
    const startTime = Date.now();
    console.log(`[${new Date().toISOString()}] POST /api/alignment - Start`);

    const parsed = alignmentRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        ok: false,
        error: `Invalid request: ${describeIssues(parsed.error)}`,
      });
    }
    const body = parsed.data;
    const now = body.now ? parseISO(body.now) : new Date();

    let range: DateRange | null = null;
    if (body.range !== undefined) {
      try {
        range = resolveDateRange(body.range, now);
      } catch (err) {
        if (err instanceof InvalidRangeError) {
          return res.status(400).json({ ok: false, error: err.message });
        }
        throw err;
      }
    }

    const goals: GoalEntry[] = body.goals.map((raw, i) => {
      const goal = goalSchema.safeParse(raw);
      if (goal.success) return goal.data;
      return { rejected: true, id: goalIdOf(raw, i), reason: describeIssues(goal.error) };
    });

    const evidence: EvidenceItem[] = [];
    let dropped = 0;
    let outOfRange = 0;
    for (const raw of body.evidence) {
      const item = evidenceItemSchema.safeParse(raw);
      if (!item.success) {
        dropped++;
        continue;
      }
      if (range && !isWithinRange(item.data.timestamp, range)) {
        outOfRange++;
        continue;
      }
      evidence.push(item.data);
    }
    if (dropped > 0) {
      console.warn(
        `[${new Date().toISOString()}] POST /api/alignment - Dropped ${dropped} malformed evidence item(s)`
      );
    }

    const report = buildAlignmentReport(
      {
        goals,
        evidence,
        months_in_role: body.months_in_role,
        exceptional_initiative: body.exceptional_initiative,
        now,
      },
      policy
    );
    if (dropped > 0) {
      report.meta.warnings.push(`Dropped ${dropped} malformed evidence item(s)`);
    }
    if (outOfRange > 0) {
      report.meta.warnings.push(`Excluded ${outOfRange} evidence item(s) outside ${range?.start}..${range?.end}`);
    }

    const duration = Date.now() - startTime;
    console.log(
      `[${new Date().toISOString()}] POST /api/alignment - Completed in ${duration}ms (${goals.length} goals)`
    );

    return res.json({ ok: true, range, report });
  });

  return router;
}
