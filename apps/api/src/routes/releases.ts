import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { downloadParamsSchema, toVersionsResponse } from '@svn-buddy-updater/shared';
import { getReleaseSyncOrchestrator } from '../services/releaseSync';

// Public, unauthenticated endpoints polled by the svn-buddy self-update command
export const releaseRoutes = new Hono();

// GET /versions - Latest version per stability
releaseRoutes.get('/versions', async (c) => {
  const latest = await getReleaseSyncOrchestrator().latestVersionsForStability();
  return c.json(toVersionsResponse(latest));
});

// GET /download/:version/:file - Redirect to the stored artifact
releaseRoutes.get(
  '/download/:version/:file',
  zValidator('param', downloadParamsSchema),
  async (c) => {
    const { version, file } = c.req.valid('param');

    const url = await getReleaseSyncOrchestrator().downloadUrl(version, file);
    if (!url) {
      return c.json({ error: 'Download not found' }, 404);
    }

    return c.redirect(url, 302);
  }
);
