import dotenv from 'dotenv';

const env = process.env.NODE_ENV || 'development';

dotenv.config({ path: `.env.${env}` });
dotenv.config({ path: '.env' });

export const DEFAULT_NOTIFICATION_POLL_INTERVAL = '1000';

export const notificationPollInterval = parseInt(
  process.env.NOTIFICATION_POLL_INTERVAL_MS ||
    DEFAULT_NOTIFICATION_POLL_INTERVAL,
);

export const defaultCurrency = process.env.DEFAULT_CURRENCY || 'USD';

// Simulated gateway, 95% of attempts go through
export const paymentSuccessRate = 0.95;

export const platformCommissionRate = 0.1;

export const recommendationLimit = 10;
export const recommendationMinScore = 50;

export const defaultPaymentTerms =
  'Payment will be processed within 30 days of campaign completion';
export const defaultDeliverables =
  'Content creation and posting as per campaign requirements';

export const authConfig = {
  maxLoginAttempts: 5,
  // seconds
  loginTimeout: 300,
  // minutes
  sessionTimeout: 30,
};

export const documentDateFormat = 'yyyy-MM-dd HH:mm:ss';
