/**
 * Express application for consultations. Built separately from server.ts so
 * tests can mount it on an ephemeral port.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { API_DEFAULTS } from '../config/defaults.js';
import { InvalidInputError, MalformedKnowledgeBaseError } from '../domain/errors.js';
import type { KnowledgeBase, KnowledgeBaseHolder } from '../knowledge/knowledgeBase.js';
import type { SynonymTable } from '../knowledge/synonyms.js';
import { parseIntake } from '../pipeline/intake.js';
import { consult } from '../pipeline/run.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('api');

const ConsultationBodySchema = z.object({
  cancerType: z.string(),
  stage: z.string(),
  proposedTreatment: z.string(),
  symptoms: z.array(z.string()).optional(),
});

const IntakeBodySchema = z.object({
  text: z.string().min(1),
});

export interface AppDependencies {
  holder: KnowledgeBaseHolder;
  synonyms: SynonymTable | null;
  /** Builds a fresh snapshot from the configured source and swaps it in */
  reload: () => Promise<KnowledgeBase>;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: API_DEFAULTS.JSON_BODY_LIMIT }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      knowledge_base_version: deps.holder.current().version,
      timestamp: new Date().toISOString(),
    });
  });

  app.post('/api/consultations', (req, res) => {
    const body = ConsultationBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({
        error: 'INVALID_INPUT',
        message: 'Request body must contain cancerType, stage and proposedTreatment strings',
        issues: body.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return;
    }

    try {
      const outcome = consult(deps.holder.current(), body.data, { synonyms: deps.synonyms });
      if (outcome.status === 'unknown_combination') {
        res.status(404).json(outcome);
        return;
      }
      res.json(outcome.result);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        res.status(400).json({ error: error.code, field: error.field, message: error.message });
        return;
      }
      throw error;
    }
  });

  app.post('/api/intake', (req, res) => {
    const body = IntakeBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'INVALID_INPUT', message: 'Request body must contain a text field' });
      return;
    }
    res.json(parseIntake(body.data.text));
  });

  app.get('/api/knowledge-base', (_req, res) => {
    const kb = deps.holder.current();
    res.json({
      version: kb.version,
      entries: kb.size,
      cancer_types: kb.cancerTypes().map((cancer_type) => ({
        cancer_type,
        source: kb.sourceFor(cancer_type),
        stages: kb.stagesFor(cancer_type),
      })),
      references: kb.references,
    });
  });

  app.post('/api/knowledge-base/reload', (_req, res, next) => {
    deps
      .reload()
      .then((kb) => {
        res.json({ version: kb.version, entries: kb.size });
      })
      .catch((error: unknown) => {
        if (error instanceof MalformedKnowledgeBaseError) {
          res.status(500).json({
            error: error.code,
            message: 'Reload rejected; the previous knowledge base is still being served',
            violations: error.violations,
            version: deps.holder.current().version,
          });
          return;
        }
        next(error);
      });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ error }, 'Unhandled API error');
    res.status(500).json({ error: 'INTERNAL_ERROR', message: String(error) });
  });

  return app;
}
