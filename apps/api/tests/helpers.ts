import { createDb, migrate } from '@payoff-planner/engine';
import { createApp } from '../src/app.js';

export type App = ReturnType<typeof createApp>;

export function createTestApp(): App {
  const db = createDb(':memory:');
  migrate(db);
  return createApp(db);
}

export async function api(app: App, method: string, path: string, body?: unknown) {
  const init: RequestInit = {
    method,
    headers: { 'Content-Type': 'application/json' },
  };
  if (body !== undefined) init.body = typeof body === 'string' ? body : JSON.stringify(body);
  const res = await app.request(path, init);
  const text = await res.text();
  const data: unknown = text ? JSON.parse(text) : null;
  return { status: res.status, data };
}

export const today = () => new Date().toISOString().split('T')[0];
