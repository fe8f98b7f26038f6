import { Hono, type Context } from 'hono';
import { isRelayError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { parseTranslationInput } from '../lib/request.js';
import { SIGNATURE_HEADER } from '../lib/webhook-auth.js';
import type { RelayServices } from '../lib/services.js';

export const HEALTH_MESSAGE = 'Translator service running';

export function createApp(services: Pick<RelayServices, 'translator' | 'webhook'>): Hono {
  const app = new Hono();

  app.get('/', (c) => c.text(HEALTH_MESSAGE));

  app.get('/health', (c) => c.json({ ok: true }));

  app.post('/translate', async (c) => {
    const body: unknown = await c.req.json().catch(() => undefined);
    const input = parseTranslationInput(body);
    const result = await services.translator.translate(input);
    return c.json(result);
  });

  const webhookRoute = async (c: Context) => {
    const rawBody = new Uint8Array(await c.req.arrayBuffer());
    await services.webhook.handle(rawBody, c.req.header(SIGNATURE_HEADER));
    return c.json({ ok: true });
  };

  app.post('/webhook', webhookRoute);
  app.post('/callback', webhookRoute);

  app.onError((error, c) => {
    if (isRelayError(error)) {
      if (error.status >= 500) {
        loggers.genericFailed(`handle ${c.req.method} ${c.req.path}`, error);
      }
      return c.json({ error: error.code, detail: error.message }, error.status);
    }

    loggers.genericFailed(`handle ${c.req.method} ${c.req.path}`, error);
    return c.json({ error: 'internal_error' }, 500);
  });

  return app;
}
