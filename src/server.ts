import express from 'express';
import { mkdirSync } from 'node:fs';
import cors from 'cors';
import dotenv from 'dotenv';
import type { Request, Response, NextFunction } from 'express';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { seedCompanyDirectory } from './infra/db/seedCompanyDirectory.js';
import { CompanyDirectoryRepository } from './infra/repositories/CompanyDirectoryRepository.js';
import { SqlitePersistenceGateway } from './infra/persistence/SqlitePersistenceGateway.js';
import { SqliteCompanyDirectory } from './infra/directory/CompanyDirectory.js';
import { createLLMAdapter } from './infra/llm/createLLMAdapter.js';
import { createNotifier } from './infra/notify/createNotifier.js';
import { createRateLimiter } from './infra/rateLimiter.js';
import { JobEventBus } from './services/JobEventBus.js';
import { JobService } from './services/JobService.js';
import { ProfileExtractor } from './services/ProfileExtractor.js';
import { SuggestionGenerator } from './services/SuggestionGenerator.js';
import { JobOrchestrator, createOrchestratorConfig } from './services/JobOrchestrator.js';
import { JobRecoveryService } from './services/JobRecoveryService.js';
import { SuggestionQueryService } from './services/SuggestionQueryService.js';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { startRecoveryScheduler } from './scheduler/JobRecoveryScheduler.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

const loggerInstance = createLogger(env);
setLogger(loggerInstance);

mkdirSync(env.DATA_DIR, { recursive: true });

// Storage
const db = new DatabaseAdapter({
  filename: env.SQLITE_DB_PATH,
  busyTimeoutMs: env.PERSISTENCE_TIMEOUT_MS,
});
const directoryRepo = new CompanyDirectoryRepository(db);
const gateway = new SqlitePersistenceGateway(db);

if (env.SEED_COMPANY_DIRECTORY) {
  seedCompanyDirectory(directoryRepo);
}

// Services
const jobEventBus = new JobEventBus();
const jobService = new JobService(gateway, jobEventBus);
const jobOrchestrator = new JobOrchestrator(
  jobService,
  gateway,
  new ProfileExtractor(new SqliteCompanyDirectory(directoryRepo)),
  new SuggestionGenerator(createLLMAdapter(env), {
    timeoutMs: env.GENERATION_TIMEOUT_MS,
    suggestionCount: env.GENERATION_SUGGESTION_COUNT,
  }),
  createNotifier(env),
  createOrchestratorConfig(env)
);
const recoveryService = new JobRecoveryService(gateway, jobOrchestrator);
const suggestionQueries = new SuggestionQueryService(gateway);

const app = express();

app.use(cors());
app.use(express.json());

app.use((req: Request, _res: Response, next: NextFunction) => {
  loggerInstance.info('Incoming request', {
    method: req.method,
    path: req.path,
    ip: req.ip,
  });
  next();
});

app.get('/health', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

app.get('/ready', (_req: Request, res: Response) => {
  try {
    db.queryOne('SELECT 1 as ok');
    res.json({ status: 'ready' });
  } catch {
    res.status(503).json({ status: 'not-ready' });
  }
});

app.use(
  '/api',
  createApiRouter({
    jobService,
    jobOrchestrator,
    jobEventBus,
    suggestionQueries,
    submitLimiter: createRateLimiter({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX_REQUESTS,
    }),
  })
);

app.use(notFoundHandler);
app.use(createErrorHandler(env));

// Nothing is in flight before the server starts, so every unfinished job is resumed
await recoveryService.resumeStaleJobs(0);

const recoveryScheduler = startRecoveryScheduler(
  { intervalMinutes: env.RECOVERY_INTERVAL_MINUTES, staleMinutes: env.RECOVERY_STALE_MINUTES },
  recoveryService
);

const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
  });
});

process.on('SIGTERM', () => {
  loggerInstance.info('SIGTERM received, shutting down gracefully');
  recoveryScheduler.stop();
  server.close(() => {
    db.close();
    loggerInstance.info('Server closed');
    process.exit(0);
  });
});

export { app };
