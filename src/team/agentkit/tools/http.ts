import axios from 'axios';
import type { z } from 'zod';

const USER_AGENT = 'Mozilla/5.0 (compatible; agent-team-server/1.0)';
const REQUEST_TIMEOUT_MS = 10_000;

export type FetchResult<T> = { ok: true; data: T } | { ok: false; error: string };

/**
 * GET a JSON document and validate it. Failures come back as values so tool
 * handlers can hand them to the model instead of aborting the run.
 */
export async function fetchJson<S extends z.ZodType>(
  url: string,
  schema: S
): Promise<FetchResult<z.infer<S>>> {
  try {
    const response = await axios.get<unknown>(url, {
      headers: { Accept: 'application/json', 'User-Agent': USER_AGENT },
      timeout: REQUEST_TIMEOUT_MS,
    });

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      return { ok: false, error: `Unexpected response shape: ${parsed.error.message}` };
    }
    return { ok: true, data: parsed.data };
  } catch (error) {
    if (axios.isAxiosError(error) && error.response) {
      return { ok: false, error: `Request failed: ${error.response.status} ${error.response.statusText}` };
    }
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
