import express, { Router } from 'express';
import { toNodeHandler } from 'better-auth/node';
import type { Auth } from '../auth';

/**
 * Better Auth endpoints (sign-up, sign-in, sign-out, session). Must be mounted
 * before express.json(): the handler reads the raw request body itself.
 */
export function createAuthRouter(auth: Auth): Router {
  const router: Router = express.Router();

  // Convert Better Auth handler to Node.js compatible handler
  const nodeHandler = toNodeHandler(auth.handler);

  router.all('/api/auth/*', async (req, res) => {
    try {
      await nodeHandler(req, res);
    } catch (error) {
      console.error('❌ Better Auth error:', error);
      if (!res.headersSent) {
        res.status(500).json({ error: { message: 'Authentication server error', status: 500 } });
      }
    }
  });

  return router;
}
