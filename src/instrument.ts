import 'dotenv/config';

import * as Sentry from '@sentry/node';

// Preloaded with `--import` so Sentry can instrument express before it loads
Sentry.init({
  dsn: process.env.SENTRY_DSN,
  release: process.env.SENTRY_RELEASE,
  tracesSampleRate: 1.0,
  integrations: [Sentry.consoleLoggingIntegration({levels: ['log', 'warn', 'error']})],
  enableLogs: true,
});
