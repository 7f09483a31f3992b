import { AuthenticationManager } from './auth';
import { CampaignService } from './common/campaign/common';
import { RecommendationService } from './common/campaign/recommendation';
import { ContractService } from './common/contract';
import { UserService } from './common/users';
import type { PaymentGateway } from './entity';
import { logger, type Logger } from './logger';
import {
  NotificationService,
  type NotificationDispatcher,
} from './notifications';

export interface ContextOptions {
  log?: Logger;
  random?: () => number;
  gateway?: PaymentGateway;
  dispatch?: NotificationDispatcher;
  notificationPollInterval?: number;
}

/**
 * Wires the repositories and services of one marketplace instance together.
 * Satisfies the workflow context the campaign lifecycle functions expect.
 */
export class Context {
  readonly log: Logger;
  readonly users: UserService;
  readonly campaigns: CampaignService;
  readonly contracts: ContractService;
  readonly notifications: NotificationService;
  readonly recommendations: RecommendationService;
  readonly auth: AuthenticationManager;

  constructor({
    log = logger,
    random,
    gateway,
    dispatch,
    notificationPollInterval,
  }: ContextOptions = {}) {
    this.log = log;
    this.users = new UserService();
    this.campaigns = new CampaignService();
    this.contracts = new ContractService({ gateway });
    this.notifications = new NotificationService({
      log,
      dispatch,
      pollInterval: notificationPollInterval,
    });
    this.recommendations = new RecommendationService({
      users: this.users,
      campaigns: this.campaigns,
      random,
    });
    this.auth = new AuthenticationManager({ users: this.users });
  }
}
