import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as honoLogger } from 'hono/logger';
import { config, logger } from './config';
import { errorHandler } from './middleware/errorHandler';
import { createAgentRoutes, type AgentRouteDeps } from './routes/agent';
import healthRoutes from './routes/health';

export interface AppOptions {
  corsOrigins?: string[];
  requestLogging?: boolean;
}

export function createApp(deps: AgentRouteDeps, options: AppOptions = {}) {
  const app = new Hono();
  const origins = options.corsOrigins ?? config.corsOrigins;

  if (options.requestLogging ?? config.nodeEnv !== 'test') {
    app.use('*', honoLogger((message) => logger.info(message)));
  }
  app.use(
    '*',
    cors({
      origin: origins.includes('*') ? '*' : origins,
      credentials: !origins.includes('*'),
    })
  );
  app.onError(errorHandler);

  app.get('/', (c) => c.json({ message: 'Agent team server is running' }));
  app.route('/health', healthRoutes);
  app.route('/agent', createAgentRoutes(deps));

  return app;
}
