export type NotificationSeverity = 'info' | 'warning' | 'critical';

export type Notification = {
  id: string;
  entryId: string;
  title: string;
  message: string;
  severity: NotificationSeverity;
  createdAt: string;
  metadata?: Record<string, unknown>;
};

const reauthTemplate = {
  title: 'Bluelink KR 재인증 필요',
  message:
    'Hyundai Bluelink (KR) 로그인 후 364일이 지나 재인증이 필요합니다. 통합을 다시 설정하세요.',
  severity: 'critical',
} as const;

export const reauthNotificationId = (entryId: string): string =>
  `bluelink_kr_reauth_${entryId}`;

/**
 * In-process persistent notifications. A re-authentication notice is raised at
 * most once per entry until it is dismissed or the entry is re-authenticated.
 */
export class NotificationCenter {
  private readonly notifications = new Map<string, Notification>();

  private readonly reauthNotified = new Set<string>();

  notifyReauthRequired(entryId: string, reason: string): Notification | null {
    if (this.reauthNotified.has(entryId)) {
      return null;
    }

    const notification: Notification = {
      id: reauthNotificationId(entryId),
      entryId,
      title: reauthTemplate.title,
      message: reauthTemplate.message,
      severity: reauthTemplate.severity,
      createdAt: new Date().toISOString(),
      metadata: { reason },
    };

    this.notifications.set(notification.id, notification);
    this.reauthNotified.add(entryId);
    return notification;
  }

  // Called once the entry holds fresh credentials again.
  clearReauth(entryId: string): void {
    this.notifications.delete(reauthNotificationId(entryId));
    this.reauthNotified.delete(entryId);
  }

  list(): Notification[] {
    return Array.from(this.notifications.values()).sort((a, b) =>
      a.createdAt.localeCompare(b.createdAt),
    );
  }

  dismiss(notificationId: string): boolean {
    const notification = this.notifications.get(notificationId);
    if (!notification) {
      return false;
    }

    this.notifications.delete(notificationId);
    this.reauthNotified.delete(notification.entryId);
    return true;
  }

  removeEntry(entryId: string): void {
    Array.from(this.notifications.values())
      .filter((notification) => notification.entryId === entryId)
      .forEach((notification) => this.notifications.delete(notification.id));
    this.reauthNotified.delete(entryId);
  }
}
