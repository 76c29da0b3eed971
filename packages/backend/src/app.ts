import express from 'express';
import cors from 'cors';
import { config } from './config.js';
import { logging_middleware } from './middleware/logging.js';
import { error_middleware, not_found_middleware } from './middleware/error.js';
import health_router from './routes/health.js';
import contacts_router from './routes/contacts.js';
import emails_router from './routes/emails.js';

export function create_app(): express.Application {
  const app = express();

  app.use(logging_middleware);
  app.use(cors({ origin: config.cors_origin.split(',').map((origin) => origin.trim()) }));
  app.use(express.json({ limit: '1mb' }));

  app.use('/api', health_router);
  app.use('/api', contacts_router);
  app.use('/api', emails_router);

  app.use('/api', not_found_middleware);
  app.use(error_middleware);

  return app;
}
