/**
 * Universal resolver route
 *
 * GET /1.0/identifiers/{did} -- resolution result, or the bare document with
 * ?meta=false.
 */

import express, { Request, Response, NextFunction } from 'express';
import { DID_CONTENT_TYPE } from '@did-webs/node';
import type { DidWebsService } from '../services/did-webs.js';

export function createResolverRouter(service: DidWebsService): express.Router {
  const router: express.Router = express.Router();

  router.get('/1.0/identifiers/:did', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const did = req.params.did;
      const meta = req.query.meta !== 'false';

      console.log(`[resolver] Resolving ${did} (meta: ${meta})`);

      const resolved = await service.resolve(did, meta);

      res.setHeader('Content-Type', DID_CONTENT_TYPE);
      res.json(resolved);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
