import express, { Request, Response } from 'express';
import { z } from 'zod';
import { AppConfig } from '../config';
import {
  ConfigurationError,
  DrawError,
  DrawInput,
  HistoryRecord,
  HistoryWindow,
  selectActiveHistory,
  solveDraw,
} from '../engine';
import { HistoryStore } from '../services/historyStore';

const pairSchema = z.object({
  giver: z.string().min(1),
  receiver: z.string().min(1),
});

const personSchema = z.object({
  name: z.string().min(1),
  email: z.string(),
});

const historySchema = z.object({
  year: z.number().int(),
  exclude_pairs: z.boolean(),
  pairs: z.array(pairSchema),
});

const optionsSchema = z
  .object({
    seed: z.number().int().optional(),
    maxSteps: z.number().int().min(0).optional(),
    lookbackYears: z.number().int().min(0).optional(),
    currentYear: z.number().int().optional(),
  })
  .default({});

const drawSchema = z.object({
  people: z.array(personSchema),
  whitelist: z.array(pairSchema).default([]),
  blacklist: z.array(pairSchema).default([]),
  blacklist_sets: z.array(z.array(z.string().min(1))).default([]),
  history: z.array(historySchema).default([]),
  options: optionsSchema,
});

const groupDrawSchema = drawSchema.omit({ history: true }).extend({
  year: z.number().int(),
  exclude_pairs: z.boolean().default(true),
});

const excludeSchema = z.object({ exclude_pairs: z.boolean() });

type DrawOptions = z.infer<typeof optionsSchema>;

function firstIssue(error: z.ZodError): string {
  const issue = error.errors[0];
  if (!issue) return 'Invalid payload';
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

function sendDrawError(res: Response, error: DrawError) {
  const status = error instanceof ConfigurationError ? 400 : 422;
  return res.status(status).json(error.toJSON());
}

// Records outside the window stay in the input so their names are still checked
function applyWindow(history: HistoryRecord[], window: HistoryWindow): HistoryRecord[] {
  const active = new Set(selectActiveHistory(history, window));
  return history.map((record) => ({ ...record, exclude_pairs: active.has(record) }));
}

export function createDrawRoutes(historyStore: HistoryStore, config: AppConfig) {
  const router = express.Router();

  const solveOptions = (options: DrawOptions) => ({
    seed: options.seed,
    maxSteps: options.maxSteps ?? config.searchMaxSteps,
  });

  const lookback = (options: DrawOptions) => options.lookbackYears ?? config.historyLookbackYears;

  // Solve a fully described draw without storing anything
  router.post('/draws', (req: Request, res: Response) => {
    const parsed = drawSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: firstIssue(parsed.error) });
    }

    const { options, ...draw } = parsed.data;
    const input: DrawInput = {
      ...draw,
      history: applyWindow(draw.history, {
        lookbackYears: lookback(options),
        currentYear: options.currentYear,
      }),
    };

    const result = solveDraw(input, solveOptions(options));
    if (!result.ok) {
      return sendDrawError(res, result.error);
    }
    res.json({ pairs: result.pairs, steps: result.steps });
  });

  // Get stored draws for a group, newest first
  router.get('/groups/:group/history', async (req: Request, res: Response) => {
    try {
      const history = await historyStore.listHistory(req.params.group);
      res.json({ history });
    } catch (error) {
      console.error('Error fetching history:', error);
      res.status(500).json({ error: 'Failed to fetch history' });
    }
  });

  // Draw for a new year using the group's stored history, then store the result
  router.post('/groups/:group/draws', async (req: Request, res: Response) => {
    try {
      const group = req.params.group;
      const parsed = groupDrawSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: firstIssue(parsed.error) });
      }

      const { options, year, exclude_pairs, ...draw } = parsed.data;
      const stored = await historyStore.listHistory(group);

      if (stored.some((record) => record.year === year)) {
        return res.status(409).json({ error: `A draw for ${year} already exists` });
      }

      // People who left the group no longer constrain anyone
      const roster = new Set(draw.people.map((person) => person.name));
      const history = stored.map((record) => ({
        ...record,
        pairs: record.pairs.filter((pair) => roster.has(pair.giver) && roster.has(pair.receiver)),
      }));

      const result = solveDraw(
        { ...draw, history: applyWindow(history, { lookbackYears: lookback(options), currentYear: year }) },
        solveOptions(options)
      );
      if (!result.ok) {
        return sendDrawError(res, result.error);
      }

      const saved = await historyStore.saveDraw(group, { year, exclude_pairs, pairs: result.pairs });
      if (!saved) {
        return res.status(409).json({ error: `A draw for ${year} already exists` });
      }

      console.log(`Saved ${year} draw for group ${group} (${result.pairs.length} pairs)`);
      res.status(201).json({ year, pairs: result.pairs, steps: result.steps });
    } catch (error) {
      console.error('Error creating draw:', error);
      res.status(500).json({ error: 'Failed to create draw' });
    }
  });

  // Choose whether a stored year still excludes its pairs from later draws
  router.patch('/groups/:group/history/:year', async (req: Request, res: Response) => {
    try {
      const year = Number(req.params.year);
      if (!Number.isInteger(year)) {
        return res.status(400).json({ error: 'Year must be an integer' });
      }

      const parsed = excludeSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: firstIssue(parsed.error) });
      }

      const updated = await historyStore.setExcludePairs(req.params.group, year, parsed.data.exclude_pairs);
      if (!updated) {
        return res.status(404).json({ error: `No draw for ${year}` });
      }

      res.json({ year, exclude_pairs: parsed.data.exclude_pairs });
    } catch (error) {
      console.error('Error updating history:', error);
      res.status(500).json({ error: 'Failed to update history' });
    }
  });

  return router;
}
