import { Request, Response } from 'express';
import { asyncHandler } from '../../utils';
import { TChargeService } from './charge.service';
import { ChargeValidation } from './charge.validation';

export const createChargeController = (chargeService: TChargeService) => {
  // 1. Charge a donation; status and body come from the processor outcome
  const createCharge = asyncHandler(async (req: Request, res: Response) => {
    const donation = ChargeValidation.createChargeSchema.shape.body.parse(
      req.body ?? {}
    );

    const result = await chargeService.processDonation(donation);

    if (result.body) {
      res.status(result.statusCode).json(result.body);
      return;
    }
    res.status(result.statusCode).end();
  });

  return { createCharge };
};
