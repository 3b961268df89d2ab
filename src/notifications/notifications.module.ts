import { Module } from '@nestjs/common';
import axios from 'axios';
import { NotificationSink } from './notification-sink';
import { NOTIFICATIONS_HTTP, TelegramNotificationSink } from './telegram-notification.sink';

@Module({
  providers: [
    { provide: NOTIFICATIONS_HTTP, useFactory: () => axios.create() },
    { provide: NotificationSink, useClass: TelegramNotificationSink },
  ],
  exports: [NotificationSink],
})
export class NotificationsModule {}
