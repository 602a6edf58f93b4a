import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { createServer, type Server, type Socket } from 'node:net';
import { PostgresConnection } from '../adapters/postgres.js';

/** Accepts TCP connections and never answers the startup message. */
function silentServer(): Promise<{ server: Server; port: number; sockets: Set<Socket> }> {
  const sockets = new Set<Socket>();
  const server = createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('server has no TCP address'));
        return;
      }
      resolve({ server, port: address.port, sockets });
    });
  });
}

describe('PostgresConnection cancellation', () => {
  let server: Server;
  let sockets: Set<Socket>;
  let connection: PostgresConnection;

  before(async () => {
    const silent = await silentServer();
    server = silent.server;
    sockets = silent.sockets;
    connection = new PostgresConnection({
      type: 'postgres',
      host: '127.0.0.1',
      port: silent.port,
      database: 'shop',
      user: 'reader',
      password: 'test-secret',
      connectTimeoutMs: 3_000,
    });
  });

  after(async () => {
    for (const socket of sockets) socket.destroy();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('abandons a query whose connect is still pending', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);
    const start = performance.now();
    await assert.rejects(
      connection.query('SELECT 1', { maxRows: 10, timeoutMs: 1000, signal: controller.signal }),
      { name: 'AbortError' },
    );
    assert.ok(performance.now() - start < 1_500);
  });

  it('abandons introspection whose connect is still pending', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);
    const start = performance.now();
    await assert.rejects(connection.introspect({ signal: controller.signal }), { name: 'AbortError' });
    assert.ok(performance.now() - start < 1_500);
  });
});
