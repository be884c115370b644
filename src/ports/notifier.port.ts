export type NotifyLevel = 'info' | 'warn' | 'error';

/**
 * Port: the host's user-visible notification channel.
 * Never used for control flow; the engine reports and carries on.
 */
export interface NotifierPort {
  notify(message: string, level: NotifyLevel): void;
}
