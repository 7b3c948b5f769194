import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createSessionRoutes } from './routes/sessions.js';
import type { AppConfig } from './lib/config.js';
import type { CandidateProfile } from './agents/types.js';
import type { InterviewSession } from './session/interview-session.js';

export interface AppOptions {
  config: AppConfig;
  createSession: (profile: CandidateProfile) => InterviewSession;
  sessions?: Map<string, InterviewSession>;
  now?: () => number;
}

export function createApp({ config, createSession, sessions, now }: AppOptions) {
  const app = new Hono();
  const routes = createSessionRoutes({
    createSession,
    transcriptsDir: config.session.transcripts_dir,
    limits: {
      createBodyBytes: config.server.max_create_body_bytes,
      messageBodyBytes: config.server.max_message_body_bytes,
    },
    finishedRetentionMs: config.session.finished_retention_ms,
    sessions,
    now,
  });

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    const startedAt = Date.now();
    await next();
    c.get('log').debug({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration_ms: Date.now() - startedAt,
    }, 'Request handled');
  });

  app.use('*', cors({
    origin: config.server.allowed_origins,
    credentials: true,
  }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({ status: 'ok', sessions: routes.sessions.size });
  });

  app.route('/sessions', routes.router);

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    c.get('log').error({ err }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return { app, sessions: routes.sessions };
}
