export interface Notification {
  username: string;
  message: string;
  createdAt: Date;
  read: boolean;
}

/** What the domain workflows need to notify a user. */
export interface NotificationSink {
  addNotification(username: string, message: string): void;
}

export type NotificationDispatcher = (
  notification: Notification,
) => void | Promise<void>;
