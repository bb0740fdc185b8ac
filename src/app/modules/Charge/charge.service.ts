import httpStatus from 'http-status';
import { IConfig } from '../../config';
import { ILogger, Logger } from '../../utils/logger';
import { NOTIFICATION_KIND } from '../Notification/notification.constant';
import { TNotificationService } from '../Notification/notification.service';
import {
  IChargeCreator,
  IChargeResult,
  IDonationRequest,
  TChargeOutcome,
} from './charge.interface';
import {
  buildFailureContent,
  buildSuccessContent,
  classifyChargeError,
  formatDisplayAmount,
  toChargeAmount,
  toDisplayAmount,
} from './charge.utils';

interface IChargeServiceDeps {
  config: Pick<IConfig, 'stripe'>;
  charges: IChargeCreator;
  notifications: Pick<TNotificationService, 'notifyAll'>;
  logger?: ILogger;
}

export const createChargeService = ({
  config,
  charges,
  notifications,
  logger = Logger,
}: IChargeServiceDeps) => {
  const { currency, chargeDescription } = config.stripe;

  // 1. Call the processor; rejections become a failed outcome
  const createCharge = async (
    request: IDonationRequest
  ): Promise<TChargeOutcome> => {
    try {
      const charge = await charges.create({
        amount: toChargeAmount(request.amount),
        currency,
        source: request.token,
        receipt_email: request.email || undefined,
        description: chargeDescription,
      });

      return { kind: 'success', chargeId: charge.id };
    } catch (error) {
      return classifyChargeError(error);
    }
  };

  // 2. Full donation flow: charge, notify, answer
  const processDonation = async (
    request: IDonationRequest
  ): Promise<IChargeResult> => {
    const amountLabel = formatDisplayAmount(
      toDisplayAmount(request.amount),
      currency
    );
    logger.info(
      `Got a donation request for ${amountLabel} from ${request.email}.`
    );

    const outcome = await createCharge(request);

    switch (outcome.kind) {
      case 'success':
        await notifications.notifyAll(
          NOTIFICATION_KIND.SUCCESS,
          buildSuccessContent(amountLabel, request.email)
        );
        logger.info(`Donation successful! (${outcome.chargeId})`);
        return { statusCode: httpStatus.OK, body: null };

      case 'card_declined':
        logger.error(`Card was declined: ${outcome.detail}`);
        return { statusCode: outcome.statusCode, body: outcome.error };

      case 'processor_error':
      case 'transient_error':
        logger.error(
          `An error occurred charging ${amountLabel} from ${request.email}: ${outcome.detail}`
        );
        await notifications.notifyAll(
          NOTIFICATION_KIND.FAILURE,
          buildFailureContent(outcome.detail)
        );
        return { statusCode: outcome.statusCode, body: outcome.error };
    }
  };

  return { createCharge, processDonation };
};

export type TChargeService = ReturnType<typeof createChargeService>;
