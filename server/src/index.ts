import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { LanguageModel } from './lib/llm.js';
import logger from './lib/logger.js';
import { InterviewSession, createAgents } from './session/interview-session.js';

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit after 10s if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer() {
  if (server) return server;

  const config = loadConfig();
  const llm = LanguageModel.fromSettings(config.llm);
  const agents = createAgents(llm, config);
  const { app } = createApp({
    config,
    createSession: (profile) => new InterviewSession(profile, agents, {
      difficulty: config.session.default_difficulty,
      transcriptsDir: config.session.transcripts_dir,
    }),
  });

  const port = config.server.port;
  logger.info({ port, provider: config.llm.provider }, 'Interview coach server starting');
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
