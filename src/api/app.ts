import express, { Express, Request, Response, NextFunction } from 'express';
import { ReferralsDb } from '../referrals/referralsDb';
import { createReferralsRouter } from './routes/referrals';
import { createAddressesRouter } from './routes/addresses';
import { createAnvRouter } from './routes/anv';
import { createLotteryRouter } from './routes/lottery';
import { createAuditRouter } from './routes/audit';
import { ErrorCodes, HealthResponse } from './types';

/**
 * Create an Express app exposing read-only views of the ledger
 */
export function createApp(db: ReferralsDb): Express {
  const app = express();

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    const response: HealthResponse = {
      status: 'ok',
      lotterySize: db.getLotteryHeapSize(),
      anvCount: db.getAllANVs().length,
    };
    res.json(response);
  });

  // Mount routes
  app.use('/referrals', createReferralsRouter(db));
  app.use('/addresses', createAddressesRouter(db));
  app.use('/anv', createAnvRouter(db));
  app.use('/lottery', createLotteryRouter(db));
  app.use('/audit', createAuditRouter(db));

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Unhandled error:', err);
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      code: ErrorCodes.INTERNAL_ERROR,
    });
  });

  return app;
}
