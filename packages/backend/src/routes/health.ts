import { Router } from 'express';
import { get_pool } from '../db/index.js';
import { is_gmail_configured } from '../services/gmail/client.js';
import { is_ai_available } from '../services/ai/openai.js';
import { is_apify_available } from '../services/apify.js';

const router = Router();

router.get('/health', async (_req, res) => {
  const integrations = {
    gmail: is_gmail_configured(),
    openai: is_ai_available(),
    apify: is_apify_available(),
  };

  try {
    await get_pool().query('SELECT 1');
    res.json({ status: 'ok', database: 'connected', integrations });
  } catch {
    res.status(503).json({ status: 'error', database: 'disconnected', integrations });
  }
});

export default router;
