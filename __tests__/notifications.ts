import { mock } from 'jest-mock-extended';
import type { Logger } from '../src/logger';
import { NotificationService, type Notification } from '../src/notifications';

const setup = (dispatch = jest.fn<Promise<void>, [Notification]>()) => {
  dispatch.mockResolvedValue(undefined);
  const log = mock<Logger>();
  const service = new NotificationService({ log, dispatch, pollInterval: 0 });

  return { service, dispatch, log };
};

const messagesOf = (dispatch: jest.Mock<Promise<void>, [Notification]>) =>
  dispatch.mock.calls.map(([{ username, message }]) => [username, message]);

describe('NotificationService', () => {
  it('should hold notifications until started', async () => {
    const { service, dispatch } = setup();
    service.addNotification('ava', 'first');
    service.addNotification('kai', 'second');

    await service.flush();

    expect(service.isRunning).toBe(false);
    expect(dispatch).not.toHaveBeenCalled();
    expect(service.getPendingNotificationCount()).toBe(2);
  });

  it('should deliver in the order notifications were added', async () => {
    const { service, dispatch, log } = setup();
    service.addNotification('ava', 'first');
    service.addNotification('kai', 'second');

    service.start();
    service.addNotification('ava', 'third');
    await service.flush();

    expect(messagesOf(dispatch)).toEqual([
      ['ava', 'first'],
      ['kai', 'second'],
      ['ava', 'third'],
    ]);
    expect(service.deliveredCount).toBe(3);
    expect(service.getPendingNotificationCount()).toBe(0);
    expect(log.info).toHaveBeenCalledWith('notification service started');
  });

  it('should finish the current delivery and keep the rest on stop', async () => {
    const { service, dispatch, log } = setup();
    let release = () => {};
    dispatch.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        }),
    );
    service.addNotification('ava', 'first');
    service.addNotification('kai', 'second');
    service.start();

    const stopping = service.stop();
    expect(dispatch).toHaveBeenCalledTimes(1);
    release();
    await stopping;

    expect(service.isRunning).toBe(false);
    expect(service.deliveredCount).toBe(1);
    expect(service.getPendingNotificationCount()).toBe(1);
    expect(log.info).toHaveBeenLastCalledWith(
      { pending: 1 },
      'notification service stopped',
    );

    service.start();
    await service.flush();

    expect(messagesOf(dispatch)).toEqual([
      ['ava', 'first'],
      ['kai', 'second'],
    ]);
    expect(service.deliveredCount).toBe(2);
  });

  it('should log a failed delivery and carry on', async () => {
    const { service, dispatch, log } = setup();
    const err = new Error('mailbox unavailable');
    dispatch.mockRejectedValueOnce(err);
    service.addNotification('ava', 'first');
    service.addNotification('kai', 'second');

    service.start();
    await service.flush();

    expect(log.error).toHaveBeenCalledWith(
      { err, username: 'ava' },
      'failed to deliver notification',
    );
    expect(dispatch).toHaveBeenCalledTimes(2);
    expect(service.deliveredCount).toBe(1);
  });

  it('should log notifications by default', async () => {
    const log = mock<Logger>();
    const service = new NotificationService({ log, pollInterval: 0 });
    service.addNotification('ava', 'Welcome aboard');

    service.start();
    await service.flush();
    await service.stop();

    expect(log.info).toHaveBeenCalledWith(
      { username: 'ava' },
      '[Notification for ava]: Welcome aboard',
    );
  });

  it('should keep a readable history per user', () => {
    const { service } = setup();
    service.sendBulkNotification(['ava', 'kai'], 'Welcome');
    service.addNotification('ava', 'New campaign');

    expect(service.getNotificationsForUser('ava')).toEqual([
      'Welcome',
      'New campaign',
    ]);
    expect(service.getUnreadCount('ava')).toBe(2);
    expect(service.getTotalNotificationCount()).toBe(3);

    service.markNotificationsAsRead('ava');
    expect(service.getUnreadCount('ava')).toBe(0);
    expect(service.getUnreadCount('kai')).toBe(1);

    service.clearNotificationsForUser('ava');
    expect(service.getNotificationsForUser('ava')).toEqual([]);
    expect(service.getTotalNotificationCount()).toBe(1);
    expect(service.getPendingNotificationCount()).toBe(3);
  });
});
