import express from 'express';
import cors from 'cors';
import { loadBackendEnv } from './lib/load-env';
import { loadGeneratorConfig, type GeneratorConfig } from './lib/generator-config';
import { createLogger } from './lib/logger';
import { validateRuntimePreflight, type RuntimePreflightReport } from './lib/runtime-preflight';
import { loadSystemPrompt } from './lib/system-prompt';
import { createResumeRouter } from './routes/resume';
import { createResumeGenerator, type ResumeGenerator } from './services/resume';

const logger = createLogger('Server');

export type AppDeps = {
  config: GeneratorConfig;
  preflight: RuntimePreflightReport;
  generator: Pick<ResumeGenerator, 'generate'>;
  systemInstructions: string;
};

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      profile: deps.preflight.profile,
      connectors: deps.preflight.providers,
      systemPrompt: deps.preflight.systemPrompt,
      warnings: deps.preflight.warnings,
    });
  });

  app.use('/api/resume', createResumeRouter(deps));

  // Error handling
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) return next(err);
    logger.error('Unhandled error', err);
    res.status(500).json({
      error: 'Internal server error',
      details: process.env.NODE_ENV === 'development' && err instanceof Error ? err.message : undefined,
    });
  });

  return app;
}

async function startServer(): Promise<void> {
  const envLoad = loadBackendEnv();
  const config = loadGeneratorConfig();
  const preflight = validateRuntimePreflight(config);

  logger.info(
    `Preflight profile=${preflight.profile} openai=${preflight.providers.openai} envFiles=${envLoad.loadedFiles.length} shellOpenAiKey=${envLoad.apiKeyFromShell}`,
  );
  for (const warning of preflight.warnings) {
    logger.warn(warning);
  }

  const systemInstructions = await loadSystemPrompt(config.systemPromptPath);
  const generator = createResumeGenerator(config);
  const app = createApp({ config, preflight, generator, systemInstructions });

  const port = Number(process.env.PORT || process.env.BACKEND_PORT || 3001);
  app.listen(port, () => {
    logger.info(`Résumé generator listening on port ${port}`, {
      models: config.models,
      maxAttempts: config.retry.maxAttempts,
      apiTimeoutMs: config.apiTimeoutMs,
    });
  });
}

if (require.main === module) {
  startServer().catch((error) => {
    logger.error('Failed to start server', error);
    process.exit(1);
  });
}
