import { Router, Request, Response } from 'express';
import { ReferralsDb } from '../../referrals/referralsDb';
import { auditLotteryHeap, auditReferralGraph } from '../../services/auditService';

/**
 * Create router for ledger audits
 */
export function createAuditRouter(db: ReferralsDb): Router {
  const router = Router();

  /**
   * GET /audit
   * Graph and heap audit reports
   */
  router.get('/', (_req: Request, res: Response) => {
    const graph = auditReferralGraph(db);
    const heap = auditLotteryHeap(db);
    res.json({
      success: true,
      valid: graph.valid && heap.valid,
      graph,
      heap,
    });
  });

  return router;
}
