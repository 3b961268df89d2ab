import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { createTestSettings } from '../../config/testing/test-settings';
import { SupabaseService } from '../supabase.service';

export interface RecordedRequest {
  method: string;
  url: URL;
  body: unknown;
}

export interface StubResponse {
  status: number;
  body?: unknown;
}

export type SupabaseStubHandler = (request: RecordedRequest) => StubResponse;

class StubSupabaseService extends SupabaseService {
  constructor(private readonly client: SupabaseClient) {
    super(createTestSettings());
  }

  getServiceClient(): SupabaseClient {
    return this.client;
  }
}

function requestUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input);
  return input instanceof URL ? input : new URL(input.url);
}

/**
 * A real supabase-js client whose fetch answers in process, so repositories run their
 * actual PostgREST queries against scripted responses.
 */
export function createSupabaseStub(handler: SupabaseStubHandler): {
  service: SupabaseService;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const stubFetch: typeof fetch = async (input, init) => {
    const rawBody = typeof init?.body === 'string' ? init.body : null;
    const request: RecordedRequest = {
      method: (init?.method ?? 'GET').toUpperCase(),
      url: requestUrl(input),
      body: rawBody === null ? null : JSON.parse(rawBody),
    };
    requests.push(request);
    const reply = handler(request);
    if (reply.body === undefined) {
      return new Response(null, { status: reply.status });
    }
    return new Response(JSON.stringify(reply.body), {
      status: reply.status,
      headers: { 'Content-Type': 'application/json' },
    });
  };

  const settings = createTestSettings();
  const client = createClient(settings.supabase.url ?? 'http://localhost:54321', 'test-service-key', {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: stubFetch },
  });
  return { service: new StubSupabaseService(client), requests };
}
