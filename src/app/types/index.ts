import { IConfig } from '../config';
import { TChargeService } from '../modules/Charge/charge.service';
import { ILogger } from '../utils/logger';

export interface IErrorSource {
  path: string | number;
  message: string;
}

// Everything the HTTP layer needs, built once at startup.
export interface IAppContext {
  config: IConfig;
  chargeService: TChargeService;
  logger: ILogger;
}
