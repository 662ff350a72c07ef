/**
 * Supabase Table Client Mock
 * Records every query-builder call; each `from()` consumes the next queued response
 */

import type { SupabaseClient } from '@supabase/supabase-js';

export interface RecordedCall {
  method: string;
  args: unknown[];
}

export interface MockResponse {
  data?: unknown;
  error?: { code: string; message: string; details?: string | null; hint?: string | null } | null;
  count?: number | null;
}

export interface SupabaseMock {
  client: SupabaseClient;
  /** One list of calls per `from()` invocation, in order */
  queries: RecordedCall[][];
}

function createBuilder(calls: RecordedCall[], response: MockResponse): object {
  const resolved = {
    data: response.data ?? null,
    error: response.error ?? null,
    count: response.count ?? null,
  };

  const builder: object = new Proxy(
    {},
    {
      get(_target, prop) {
        if (prop === 'then') {
          return (
            resolve: (value: typeof resolved) => unknown,
            reject: (reason: unknown) => unknown
          ) => Promise.resolve(resolved).then(resolve, reject);
        }
        return (...args: unknown[]) => {
          calls.push({ method: String(prop), args });
          return builder;
        };
      },
    }
  );
  return builder;
}

export function createSupabaseMock(responses: MockResponse[] = []): SupabaseMock {
  const queue = [...responses];
  const queries: RecordedCall[][] = [];

  const client = {
    from(table: string) {
      const calls: RecordedCall[] = [{ method: 'from', args: [table] }];
      queries.push(calls);
      return createBuilder(calls, queue.shift() ?? {});
    },
  };

  return { client: client as unknown as SupabaseClient, queries };
}

/**
 * Calls of one query without the leading `from`
 */
export function chain(calls: RecordedCall[] | undefined): RecordedCall[] {
  return (calls ?? []).slice(1);
}
