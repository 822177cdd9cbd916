import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Pool } from 'pg';
import { buildServer, loadStartupRegistries } from './server.ts';
import { buildColumnRegistry } from './list-columns/index.ts';

function mockPool(queryFn: ReturnType<typeof vi.fn>): Pool {
  return { query: queryFn, end: vi.fn() } as unknown as Pool;
}

describe('buildServer', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('answers health checks', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const app = buildServer({ pool: mockPool(vi.fn()), registries: new Map() });

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
    await app.close();
  });

  it('serves the list route for the given registries and leaves an injected pool open', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const queryFn = vi.fn(async (text: string) => (text.startsWith('SELECT COUNT') ? { rows: [{ total: '0' }] } : { rows: [] }));
    const pool = mockPool(queryFn);
    const app = buildServer({
      pool,
      registries: new Map([['event', buildColumnRegistry('event', { venue: { title: 'Venue' } })]]),
    });

    const res = await app.inject({ method: 'GET', url: '/api/content/event/list' });
    await app.close();

    expect(res.statusCode).toBe(200);
    expect(res.json().columns.map((column: { key: string }) => column.key)).toEqual(['title', 'date', 'venue']);
    expect(res.json().rows).toEqual([]);
    expect(pool.end).not.toHaveBeenCalled();
  });

  it('logs an unreadable declaration file at startup and yields no registries', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.stubEnv('LIST_COLUMNS_CONFIG_FILE', '/nonexistent/list-columns.json');

    expect(loadStartupRegistries()).toBeNull();
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toContain('[ERROR] [server] Invalid list column configuration');
  });

  it('returns an empty registry set when no declaration file is configured', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.stubEnv('LIST_COLUMNS_CONFIG_FILE', '');

    expect(loadStartupRegistries()?.size).toBe(0);
  });
});
