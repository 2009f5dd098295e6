import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { getErrorMessage, isDidWebsError, isoTimestamp, type DidWebsErrorCode } from '@did-webs/node';
import { createResolverRouter } from './routes/resolver.js';
import { createKelRouter } from './routes/kel.js';
import type { DidWebsService } from './services/did-webs.js';
import type { KelSource } from './types/index.js';

export const VERSION = '0.1.0';

export interface AppDeps {
  service: DidWebsService;
  kel: KelSource;
  didPath: string;
}

const STATUS_BY_CODE: Record<DidWebsErrorCode, number> = {
  InvalidDidFormat: 400,
  InvalidIdentifier: 400,
  MismatchedIdentifier: 400,
  UnknownIdentifier: 404,
  InvalidPolicy: 500,
  EmptyDocument: 500,
  MissingDocumentField: 500,
};

export function createApp({ service, kel, didPath }: AppDeps): express.Express {
  const app = express();

  app.use(cors({
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept'],
  }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: isoTimestamp(),
      version: VERSION,
    });
  });

  app.use('/', createResolverRouter(service));

  // KEL routes -- mounted at root so did:webs resolvers can fetch
  // /{didPath}/{AID}/did.json and /{didPath}/{AID}/keri.cesr directly
  app.use('/', createKelRouter({ service, kel, didPath }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isDidWebsError(err)) {
      const status = STATUS_BY_CODE[err.code];
      if (status >= 500) {
        console.error(`[server] ${err.name}: ${err.message}`);
      }
      res.status(status).json({
        error: err.message,
        code: err.code,
        timestamp: isoTimestamp(),
      });
      return;
    }

    console.error('[server] Error:', getErrorMessage(err));
    if (err instanceof Error) {
      console.error(err.stack);
    }

    res.status(500).json({
      error: getErrorMessage(err) || 'Internal server error',
      timestamp: isoTimestamp(),
    });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not found',
      timestamp: isoTimestamp(),
    });
  });

  return app;
}
