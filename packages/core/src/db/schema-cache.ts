/**
 * Caller-side cache of schema descriptions, keyed by connection id.
 *
 * The cache never detects schema drift on its own: call invalidate() after
 * anything that may have changed the database structure.
 */

import type { DatabaseConnection, SchemaDescription } from './types.js';
import type { SchemaInspector } from './inspect.js';
import { RequestCancelledError } from '../errors.js';

export interface SchemaCacheStats {
  entries: number;
  hits: number;
  misses: number;
}

export class SchemaCache {
  private readonly entries = new Map<string, SchemaDescription>();
  private readonly inflight = new Map<string, Promise<SchemaDescription>>();
  /** Bumped by invalidate(); a load only stores its result if the number is unchanged. */
  private readonly generations = new Map<string, number>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly inspector: SchemaInspector,
    private readonly ttlMs: number = Infinity,
  ) {}

  /**
   * Return the cached description for this connection, describing it on a
   * miss. Concurrent misses for the same connection share one inspection.
   * The caller's signal only abandons that caller's wait.
   */
  async get(connection: DatabaseConnection, opts: { signal?: AbortSignal } = {}): Promise<SchemaDescription> {
    if (opts.signal?.aborted) {
      throw new RequestCancelledError('schema inspection');
    }

    const cached = this.entries.get(connection.id);
    if (cached && Date.now() - cached.capturedAt.getTime() < this.ttlMs) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const loading = this.inflight.get(connection.id) ?? this.load(connection);
    return opts.signal ? abandonOnAbort(loading, opts.signal) : loading;
  }

  private load(connection: DatabaseConnection): Promise<SchemaDescription> {
    const id = connection.id;
    const generation = this.generations.get(id) ?? 0;

    const loading: Promise<SchemaDescription> = this.inspector
      .describe(connection)
      .then((schema) => {
        if ((this.generations.get(id) ?? 0) === generation) {
          this.entries.set(id, schema);
        }
        return schema;
      })
      .finally(() => {
        if (this.inflight.get(id) === loading) this.inflight.delete(id);
      });
    this.inflight.set(id, loading);
    return loading;
  }

  /**
   * Drop one connection's entry, or every entry when no id is given.
   * A load already under way is not stored; the next get() describes again.
   */
  invalidate(connectionId?: string): void {
    const ids = connectionId === undefined ? [...this.entries.keys(), ...this.inflight.keys()] : [connectionId];
    for (const id of ids) {
      this.generations.set(id, (this.generations.get(id) ?? 0) + 1);
      this.entries.delete(id);
      this.inflight.delete(id);
    }
  }

  stats(): SchemaCacheStats {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }
}

function abandonOnAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new RequestCancelledError('schema inspection'));
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}
