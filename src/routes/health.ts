import { Hono } from 'hono';

export interface HealthResponse {
  status: 'healthy';
  service: string;
  timestamp: string;
}

const app = new Hono();

app.get('/', (c) => {
  const response: HealthResponse = {
    status: 'healthy',
    service: 'agent-team-server',
    timestamp: new Date().toISOString(),
  };

  return c.json(response);
});

export default app;
