import { Router, Request, Response } from 'express';
import { ReferralsDb } from '../../referrals/referralsDb';
import { toAnvDto } from '../dto';
import { AnvListResponse } from '../types';

/**
 * Create router for ANV listings
 */
export function createAnvRouter(db: ReferralsDb): Router {
  const router = Router();

  /**
   * GET /anv
   * All ANV records in store order
   * Query params: rewardable=true restricts to lottery-eligible types
   */
  router.get('/', (req: Request, res: Response) => {
    const rewardableOnly = req.query.rewardable === 'true';
    const records = rewardableOnly ? db.getAllRewardableANVs() : db.getAllANVs();

    const response: AnvListResponse = {
      success: true,
      count: records.length,
      anvs: records.map(toAnvDto),
    };
    res.json(response);
  });

  return router;
}
