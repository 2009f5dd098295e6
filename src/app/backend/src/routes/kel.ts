/**
 * KEL Publishing Routes
 *
 * Serves DID documents and KERI event logs for did:webs resolution.
 * Mounted at root so a resolver can fetch /{didPath}/{AID}/did.json and
 * /{didPath}/{AID}/keri.cesr directly.
 */

import express, { Request, Response, NextFunction } from 'express';
import { isoTimestamp, KelUnavailableError, validatePrefix } from '@did-webs/node';
import type { DidWebsService } from '../services/did-webs.js';
import type { KelSource } from '../types/index.js';

export interface KelRouterDeps {
  service: DidWebsService;
  kel: KelSource;
  /** `/`-separated path the routes live under, e.g. "keri" */
  didPath: string;
}

export function createKelRouter({ service, kel, didPath }: KelRouterDeps): express.Router {
  const router: express.Router = express.Router();
  const pathSegments = didPath.split('/').filter(segment => segment.length > 0);
  const prefix = pathSegments.map(segment => `/${segment}`).join('');

  /**
   * GET /{didPath}/:aid/did.json
   * DID document for a KERI AID, in did:web form for did:web resolvers.
   */
  router.get(`${prefix}/:aid/did.json`, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const aid = req.params.aid;

      // Determine the domain from the request
      const host = req.get('host') || 'localhost';
      const domain = host.replace(':', '%3A'); // URL encode the port separator

      console.log(`[kel-publisher] Generating did.json for AID: ${aid}`);

      const didDocument = await service.didJson(aid, domain, pathSegments);

      res.json(didDocument);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /{didPath}/:aid/keri.cesr
   * KERI event log in CESR format for an AID.
   */
  router.get(`${prefix}/:aid/keri.cesr`, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const aid = validatePrefix(req.params.aid);

      console.log(`[kel-publisher] Fetching keri.cesr for AID: ${aid}`);

      const cesrData = await kel.getKeriCesr(aid);

      res.setHeader('Content-Type', 'application/cesr');
      res.send(cesrData);
    } catch (error: unknown) {
      if (error instanceof KelUnavailableError) {
        res.status(404).json({
          error: `Failed to fetch CESR for AID: ${error.aid}`,
          timestamp: isoTimestamp(),
        });
        return;
      }
      next(error);
    }
  });

  return router;
}
