import type { FastifyInstance } from 'fastify';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { MessageStore } from '../messages/index.js';

const ROOT_PACKAGE_JSON = new URL('../../../../package.json', import.meta.url);

let cachedVersion: string | null | undefined;

/** Version of the workspace root package; null when it cannot be read (e.g. a trimmed deploy). */
export function getRootVersion(): string | null {
  if (cachedVersion !== undefined) return cachedVersion;
  let version: string | null = null;
  try {
    const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(ROOT_PACKAGE_JSON), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      version = pkg.version;
    }
  } catch {
    version = null;
  }
  cachedVersion = version;
  return version;
}

export interface HealthRoutesOptions {
  store: MessageStore;
}

export async function healthRoutes(app: FastifyInstance, opts: HealthRoutesOptions) {
  app.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'Health check',
      description: 'Liveness plus a row count, which also proves the message table is readable.',
      response: {
        200: {
          description: 'Server and database are up',
          type: 'object',
          properties: {
            ok: { type: 'boolean' },
            timestamp: { type: 'string', format: 'date-time' },
            messages: { type: 'integer' },
          },
          required: ['ok', 'timestamp', 'messages'],
        },
      },
    },
  }, async () => ({
    ok: true,
    timestamp: new Date().toISOString(),
    messages: opts.store.count(),
  }));

  app.get('/version', {
    schema: {
      tags: ['Health'],
      summary: 'Running version',
      description: 'Chatterbox release this server was started from; "unknown" outside a full checkout.',
      response: {
        200: {
          description: 'Release version',
          type: 'object',
          properties: { version: { type: 'string' } },
          required: ['version'],
        },
      },
    },
  }, async () => ({ version: getRootVersion() ?? 'unknown' }));
}
