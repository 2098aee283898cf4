import { Router, Request, Response } from 'express';
import { ReferralsDb } from '../../referrals/referralsDb';
import { toLotteryEntryDto } from '../dto';
import { LotteryResponse } from '../types';

/**
 * Create router for the lottery reservoir
 */
export function createLotteryRouter(db: ReferralsDb): Router {
  const router = Router();

  /**
   * GET /lottery
   * Reservoir contents in slot order (slot 0 is the minimum)
   */
  router.get('/', (_req: Request, res: Response) => {
    const minKey = db.getLotteryMinKey();

    const response: LotteryResponse = {
      success: true,
      size: db.getLotteryHeapSize(),
      capacity: db.lotteryCapacity,
      minKey: minKey ? minKey.toString() : null,
      entries: db.getLotteryEntries().map(toLotteryEntryDto),
    };
    res.json(response);
  });

  return router;
}
