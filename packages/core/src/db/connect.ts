/**
 * Connection factory.
 * Selects the correct adapter based on the configured database type.
 */

import type { Logger } from 'pino';
import type { ConnectionConfig, DatabaseConnection } from './types.js';
import { SqliteConnection } from './adapters/sqlite.js';
import { PostgresConnection } from './adapters/postgres.js';

export function openConnection(config: ConnectionConfig, logger?: Logger): DatabaseConnection {
  switch (config.type) {
    case 'sqlite':
      return new SqliteConnection(config);
    case 'postgres':
      return new PostgresConnection(config, logger);
  }
}

export async function testConnection(
  connection: DatabaseConnection,
): Promise<{ ok: boolean; error?: string; serverVersion?: string }> {
  try {
    const serverVersion = await connection.ping();
    return { ok: true, serverVersion };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  }
}
