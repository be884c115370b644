import type { NotifierPort, NotifyLevel } from '../../../src/ports/notifier.port.js';

export interface Notification {
  readonly message: string;
  readonly level: NotifyLevel;
}

export class RecordingNotifier implements NotifierPort {
  readonly notifications: Notification[] = [];

  notify(message: string, level: NotifyLevel): void {
    this.notifications.push({ message, level });
  }

  messages(level?: NotifyLevel): readonly string[] {
    return this.notifications.filter((n) => level === undefined || n.level === level).map((n) => n.message);
  }
}
