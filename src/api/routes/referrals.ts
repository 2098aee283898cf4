import { Router, Request, Response } from 'express';
import { ReferralsDb } from '../../referrals/referralsDb';
import { isHash256 } from '../../validation';
import { ErrorCodes, ReferralResponse } from '../types';

/**
 * Create router for referral lookups
 */
export function createReferralsRouter(db: ReferralsDb): Router {
  const router = Router();

  /**
   * GET /referrals/:codeHash
   * Referral record by code hash
   */
  router.get('/:codeHash', (req: Request, res: Response) => {
    const codeHash = req.params.codeHash.toLowerCase();

    if (!isHash256(codeHash)) {
      res.status(400).json({
        success: false,
        error: `Invalid code hash: ${req.params.codeHash}`,
        code: ErrorCodes.INVALID_HASH,
      });
      return;
    }

    const referral = db.getReferral(codeHash);
    if (!referral) {
      res.status(404).json({
        success: false,
        error: `Referral not found: ${codeHash}`,
        code: ErrorCodes.REFERRAL_NOT_FOUND,
      });
      return;
    }

    const response: ReferralResponse = { success: true, referral };
    res.json(response);
  });

  return router;
}
