export {
  LoggingNotificationSink,
  subscribeNotifications,
  type NotificationRecord,
  type NotificationSink,
  type NotificationType
} from './notificationSink.js';
