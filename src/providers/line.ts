import { fail, ok, type Result } from '../errors';
import type { FetchFn } from './routing';

const LINE_PUSH_URL = 'https://api.line.me/v2/bot/message/push';

export interface LineOptions {
  accessToken?: string;
  fetch?: FetchFn;
  url?: string;
}

/** Push a plain-text message to one LINE user. */
export async function sendLineMessage(
  userId: string,
  message: string,
  opts: LineOptions = {},
): Promise<Result<void>> {
  const token = opts.accessToken ?? process.env.LINE_CHANNEL_ACCESS_TOKEN;
  if (!token) {
    return fail('DELIVERY_FAILED', 'LINE_CHANNEL_ACCESS_TOKEN is not configured');
  }
  const doFetch = opts.fetch ?? fetch;
  try {
    const res = await doFetch(opts.url ?? LINE_PUSH_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ to: userId, messages: [{ type: 'text', text: message }] }),
    });
    if (!res.ok) {
      const text = await res.text();
      return fail('DELIVERY_FAILED', `LINE push failed: ${res.status} ${res.statusText} - ${text}`, {
        status: res.status,
      });
    }
  } catch (err) {
    return fail(
      'DELIVERY_FAILED',
      `LINE push failed: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return ok(undefined);
}
