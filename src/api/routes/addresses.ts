import { Router, Request, Response } from 'express';
import { ReferralsDb } from '../../referrals/referralsDb';
import { isAddress } from '../../validation';
import { toAnvDto } from '../dto';
import { AddressResponse, ErrorCodes } from '../types';

/**
 * Create router for per-address tree and ANV views
 */
export function createAddressesRouter(db: ReferralsDb): Router {
  const router = Router();

  /**
   * GET /addresses/:address
   * Referrer, direct children and ANV of an address
   */
  router.get('/:address', (req: Request, res: Response) => {
    const address = req.params.address.toLowerCase();

    if (!isAddress(address)) {
      res.status(400).json({
        success: false,
        error: `Invalid address: ${req.params.address}`,
        code: ErrorCodes.INVALID_ADDRESS,
      });
      return;
    }

    const referrer = db.getReferrer(address);
    const anv = db.getANV(address);

    if (referrer === undefined && anv === undefined) {
      res.status(404).json({
        success: false,
        error: `Address not found: ${address}`,
        code: ErrorCodes.ADDRESS_NOT_FOUND,
      });
      return;
    }

    const response: AddressResponse = {
      success: true,
      address,
      referrer: referrer ?? null,
      children: db.getChildren(address),
      anv: anv ? toAnvDto(anv) : null,
    };
    res.json(response);
  });

  return router;
}
