import type { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { SessionRegistry } from '../../core/assistant/SessionRegistry.js';
import type { CaddieAssistant } from '../../core/assistant/CaddieAssistant.js';
import { MISS_DIRECTIONS } from '../../core/models/session.js';
import { recoveryFor } from '../../core/recovery/ErrorRecovery.js';
import { NoActiveSessionError, ValidationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const messageBody = z.object({
  text: z.string().max(2000),
  inputType: z.enum(['TEXT', 'VOICE']).default('TEXT'),
});

const confirmationBody = z.object({ accepted: z.boolean() });

const suggestionBody = z.object({ index: z.number().int().min(0) });

const roundBody = z.object({
  courseName: z.string().trim().min(1).max(200),
  startingHole: z.number().int().min(1).max(18).default(1),
  startingPar: z.number().int().min(3).max(5).default(4),
});

const holeBody = z.object({
  holeNumber: z.number().int(),
  par: z.number().int().default(4),
});

const shotBody = z.object({
  club: z.string().trim().min(1),
  lie: z.string().trim().min(1),
  missDirection: z.enum(MISS_DIRECTIONS).optional(),
  pressure: z
    .object({
      isUserTagged: z.boolean().default(false),
      isInferred: z.boolean().default(false),
      scoringContext: z.string().trim().min(1).optional(),
    })
    .optional(),
  notes: z.string().max(500).optional(),
});

type SessionHandler = (assistant: CaddieAssistant, req: Request, res: Response) => Promise<void> | void;

export function createSessionRouter(sessions: SessionRegistry): Router {
  const logger = createLogger({ component: 'sessionRouter' });
  const router = express.Router();

  /** Resolves `:id`, runs the handler and maps domain errors to status codes. */
  const withSession =
    (handler: SessionHandler): RequestHandler =>
    (req: Request, res: Response, next: NextFunction) => {
      const sessionId = req.params.id ?? '';
      const assistant = sessions.get(sessionId);
      if (!assistant) {
        res.status(404).json({ error: 'SESSION_NOT_FOUND' });
        return;
      }
      Promise.resolve()
        .then(() => handler(assistant, req, res))
        .catch((error: unknown) => {
          if (error instanceof z.ZodError) {
            res.status(400).json({
              error: 'INVALID_REQUEST',
              issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
            });
          } else if (error instanceof NoActiveSessionError) {
            res.status(409).json({ error: error.code, message: recoveryFor('NO_ACTIVE_SESSION').message });
          } else if (error instanceof ValidationError) {
            res.status(422).json({ error: error.code, message: error.message });
          } else {
            logger.error({ error, sessionId }, 'Session request failed');
            next(error);
          }
        });
    };

  router.post('/', (_req, res) => {
    const assistant = sessions.create();
    res.status(201).json({ sessionId: assistant.sessionId });
  });

  router.delete(
    '/:id',
    withSession((assistant, _req, res) => {
      sessions.delete(assistant.sessionId);
      res.status(204).end();
    })
  );

  router.post(
    '/:id/messages',
    withSession(async (assistant, req, res) => {
      const body = messageBody.parse(req.body);
      res.status(200).json(await assistant.handleInput(body.text, body.inputType));
    })
  );

  router.post(
    '/:id/confirmation',
    withSession(async (assistant, req, res) => {
      const body = confirmationBody.parse(req.body);
      res.status(200).json(await assistant.confirm(body.accepted));
    })
  );

  router.post(
    '/:id/suggestions',
    withSession(async (assistant, req, res) => {
      const body = suggestionBody.parse(req.body);
      res.status(200).json(await assistant.selectSuggestion(body.index));
    })
  );

  router.post(
    '/:id/round',
    withSession((assistant, req, res) => {
      const body = roundBody.parse(req.body);
      const round = assistant.startRound(body.courseName, body.startingHole, body.startingPar);
      res.status(201).json(round);
    })
  );

  router.delete(
    '/:id/round',
    withSession((assistant, _req, res) => {
      assistant.endRound();
      res.status(204).end();
    })
  );

  router.put(
    '/:id/hole',
    withSession((assistant, req, res) => {
      const body = holeBody.parse(req.body);
      assistant.updateHole(body.holeNumber, body.par);
      res.status(200).json({ summary: assistant.describeContext().summary });
    })
  );

  router.post(
    '/:id/shots',
    withSession((assistant, req, res) => {
      const body = shotBody.parse(req.body);
      res.status(201).json(assistant.recordShot(body));
    })
  );

  router.get(
    '/:id/shots',
    withSession((assistant, _req, res) => {
      res.status(200).json({ shots: assistant.roundShots() });
    })
  );

  router.get(
    '/:id/context',
    withSession((assistant, _req, res) => {
      const { summary, prompt } = assistant.describeContext();
      res.status(200).json({ summary, context: prompt });
    })
  );

  return router;
}
