import * as matchers from 'jest-extended';

process.env.LOG_LEVEL = 'silent';
process.env.NOTIFICATION_POLL_INTERVAL_MS = '0';

expect.extend(matchers);
