// impactscore-backend/src/routes/dateRange.ts

import { Router, Request, Response } from "express";
import { parseISO } from "date-fns";
import { z } from "zod";
import { InvalidRangeError } from "../types/errors";
import { describeIssues, nowSchema } from "../schemas/requests";
import { resolveDateRange } from "../services/dateRange";

const querySchema = z.object({
  range: z.string().optional(),
  now: nowSchema,
});

const router = Router();

router.get("/", (req: Request, res: Response) => {
  const parsed = querySchema.safeParse(req.query);
  if (!parsed.success) {
    return res.status(400).json({ ok: false, error: `Invalid query: ${describeIssues(parsed.error)}` });
  }

  const now = parsed.data.now ? parseISO(parsed.data.now) : new Date();
  try {
    return res.json({ ok: true, range: resolveDateRange(parsed.data.range, now) });
  } catch (err) {
    if (err instanceof InvalidRangeError) {
      return res.status(400).json({ ok: false, error: err.message });
    }
    throw err;
  }
});

export default router;
