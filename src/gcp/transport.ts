import { GoogleAuth } from 'google-auth-library';
import { z } from 'zod';
import { GcpApiError } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  body?: unknown;
  query?: Record<string, string>;
}

/** One authenticated round trip to a control-plane API */
export interface Transport {
  request(req: HttpRequest): Promise<unknown>;
}

export const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

// ── Error mapping ──

const googleErrorBody = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

const failedResponse = z.object({
  message: z.string().optional(),
  response: z.object({
    status: z.number(),
    data: z.unknown(),
  }),
});

/** Convert a failed request into a GcpApiError; other errors pass through unchanged */
export function toGcpApiError(err: unknown, req: HttpRequest): unknown {
  const parsed = failedResponse.safeParse(err);
  if (!parsed.success) return err;

  const { status, data } = parsed.data.response;
  const body = googleErrorBody.safeParse(data);
  const message = body.success && body.data.error.message
    ? body.data.error.message
    : parsed.data.message ?? `HTTP ${status}`;
  const reason = body.success ? body.data.error.status : undefined;

  return new GcpApiError(status, `${req.method} ${req.url}: ${message}`, reason);
}

// ── Google transport ──

/** Transport backed by Application Default Credentials */
export function createGoogleTransport(auth = new GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE] })): Transport {
  return {
    async request(req) {
      debug('gcp:http', req.method, req.url);
      try {
        const res = await auth.request<unknown>({
          url: req.url,
          method: req.method,
          params: req.query,
          data: req.body,
        });
        return res.data;
      } catch (err) {
        throw toGcpApiError(err, req);
      }
    },
  };
}

/** Issue a request and validate the response body */
export async function requestJson<T>(
  transport: Transport,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  req: HttpRequest,
): Promise<T> {
  const data = await transport.request(req);
  const result = schema.safeParse(data ?? {});
  if (!result.success) {
    throw new GcpApiError(
      502,
      `${req.method} ${req.url}: unexpected response (${result.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ')})`,
    );
  }
  return result.data;
}
