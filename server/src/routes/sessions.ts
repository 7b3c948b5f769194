import path from 'node:path';
import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { validateBody } from '../lib/validate.js';
import type { FieldIssue } from '../lib/validate.js';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { ProfileSchema } from '../agents/schemas/session-schemas.js';
import type { CandidateProfile } from '../agents/types.js';
import { SessionError } from '../session/interview-session.js';
import type { InterviewSession, SessionErrorCode } from '../session/interview-session.js';

const CreateSessionSchema = z.object({ profile: ProfileSchema });
const MessageSchema = z.object({ message: z.string().max(20_000) });
const PersistSchema = z.object({
  path: z.string().trim().min(1).optional(),
  include_metadata: z.boolean().optional(),
});

const ERROR_STATUS: Record<SessionErrorCode, 409 | 502> = {
  SESSION_BUSY: 409,
  SESSION_CLOSED: 409,
  RESPONSE_FAILED: 502,
};

export interface SessionRoutesOptions {
  createSession: (profile: CandidateProfile) => InterviewSession;
  /** Explicit persist paths must resolve inside this directory */
  transcriptsDir: string;
  limits: { createBodyBytes: number; messageBodyBytes: number };
  /** Finished sessions older than this are dropped when a new one is created */
  finishedRetentionMs: number;
  sessions?: Map<string, InterviewSession>;
  now?: () => number;
}

function invalidBody(c: Context, details: FieldIssue[]) {
  return c.json({ error: 'Invalid request body', details }, 400);
}

/** Resolves a caller-supplied path under `root`; null when it escapes. */
export function resolveInside(root: string, requested: string): string | null {
  const base = path.resolve(root);
  const target = path.resolve(base, requested);
  const relative = path.relative(base, target);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) return null;
  return target;
}

export function createSessionRoutes(options: SessionRoutesOptions) {
  const sessions = options.sessions ?? new Map<string, InterviewSession>();
  const { limits } = options;
  const now = options.now ?? Date.now;
  const router = new Hono();

  const pruneFinished = (c: Context) => {
    const cutoff = now() - options.finishedRetentionMs;
    for (const [id, session] of sessions) {
      const ended = session.endedAt();
      if (ended && ended.getTime() <= cutoff) {
        sessions.delete(id);
        c.get('log').info({ sessionId: id }, 'Finished session released');
      }
    }
  };

  router.post('/', async (c) => {
    const body = await parseJsonBodyWithLimit(c, limits.createBodyBytes);
    if (!body.ok) return body.response;
    const parsed = validateBody(CreateSessionSchema, body.data);
    if (!parsed.success) return invalidBody(c, parsed.issues);

    pruneFinished(c);
    const session = options.createSession(parsed.data.profile);
    sessions.set(session.id, session);
    c.get('log').info({ sessionId: session.id }, 'Session created');
    return c.json({ session_id: session.id }, 201);
  });

  router.post('/:id/messages', async (c) => {
    const session = sessions.get(c.req.param('id'));
    if (!session) return c.json({ error: 'Session not found' }, 404);

    const body = await parseJsonBodyWithLimit(c, limits.messageBodyBytes);
    if (!body.ok) return body.response;
    const parsed = validateBody(MessageSchema, body.data);
    if (!parsed.success) return invalidBody(c, parsed.issues);

    try {
      const result = await session.processTurn(parsed.data.message);
      return c.json(result);
    } catch (error) {
      if (error instanceof SessionError) {
        return c.json({ error: error.message, code: error.code }, ERROR_STATUS[error.code]);
      }
      throw error;
    }
  });

  router.get('/:id', (c) => {
    const session = sessions.get(c.req.param('id'));
    if (!session) return c.json({ error: 'Session not found' }, 404);
    const snapshot = session.snapshot();
    return c.json({
      session_id: session.id,
      phase: session.phase(),
      finished: session.isFinished(),
      difficulty: snapshot.difficulty,
      turns: [...snapshot.turns],
      final_report: snapshot.final_report,
    });
  });

  router.get('/:id/report', (c) => {
    const session = sessions.get(c.req.param('id'));
    if (!session) return c.json({ error: 'Session not found' }, 404);
    const report = session.finalReport();
    if (session.phase() !== 'DONE' || report === null) {
      return c.json({ error: 'Report not available until the interview has ended' }, 404);
    }
    return c.json({ report });
  });

  router.post('/:id/persist', async (c) => {
    const session = sessions.get(c.req.param('id'));
    if (!session) return c.json({ error: 'Session not found' }, 404);

    const body = await parseJsonBodyWithLimit(c, limits.createBodyBytes);
    if (!body.ok) return body.response;
    const parsed = validateBody(PersistSchema, body.data);
    if (!parsed.success) return invalidBody(c, parsed.issues);

    let target: string | undefined;
    if (parsed.data.path) {
      const inside = resolveInside(options.transcriptsDir, parsed.data.path);
      if (!inside) return c.json({ error: 'Path must stay inside the transcripts directory' }, 400);
      target = inside;
    }

    const written = await session.persist(target, { includeMetadata: parsed.data.include_metadata });
    return c.json({ path: written });
  });

  return { router, sessions };
}
