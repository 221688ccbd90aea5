import type { CrmStore } from '../app/store/crmStore';
import type { Customer } from '../models/Customer';
import type { Task } from '../models/Task';
import { PRIORITY_LABELS } from '../models/Task';
import { formatDateTime } from '../utils/dates';

export type ReminderKind = 'reminder' | 'overdue';

export type ReminderAlert = {
  kind: ReminderKind;
  task: Task;
  customer: Customer | null;
  customerName: string;
  firedAt: string;
};

export type NotificationHandler = (alert: ReminderAlert) => void;

export type ReminderSchedulerOptions = {
  intervalMs?: number;
  now?: () => Date;
};

export const DEFAULT_CHECK_INTERVAL_MS = 60 * 1000;

const UNKNOWN_CUSTOMER = 'Unknown';

const taskSignature = (task: Task): string => `${task.dueDate}|${task.reminderTime}`;

/** Alerts already raised for a task, valid while its schedule matches `signature`. */
type Marker = {
  signature: string;
  kinds: Set<ReminderKind>;
};

export const describeAlert = (alert: ReminderAlert): string[] => {
  const title =
    alert.kind === 'overdue'
      ? '=========== OVERDUE TASK ALERT ==========='
      : '=========== TASK REMINDER ===========';
  return [
    title,
    `${alert.kind === 'overdue' ? 'OVERDUE Task' : 'Task'}: ${alert.task.description}`,
    `Customer: ${alert.customerName}`,
    `Due Date: ${formatDateTime(alert.task.dueDate)}`,
    `Priority: ${PRIORITY_LABELS[alert.task.priority]}`,
    '='.repeat(title.length)
  ];
};

/**
 * Polls the pending tasks of a CRM store and raises one reminder and one
 * overdue alert per task. A task alerts again only after its markers are
 * cleared, either explicitly or because its due date or reminder time changed.
 * Schedule changes are picked up on every check, including those made while
 * the scheduler was stopped.
 */
export class ReminderScheduler {
  private readonly intervalMs: number;
  private readonly now: () => Date;
  /** Task id -> alerts raised against its current schedule. */
  private readonly notified = new Map<string, Marker>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private handler: NotificationHandler | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly store: CrmStore, options: ReminderSchedulerOptions = {}) {
    this.intervalMs = options.intervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
  }

  setNotificationHandler(handler: NotificationHandler | null): void {
    this.handler = handler;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.unsubscribe = this.store
      .getState()
      .registerObserver('task:updated', (task) => this.dropStaleMarker(task));
    this.checkPendingTasks();
    this.timer = setInterval(() => this.checkPendingTasks(), this.intervalMs);
    console.info(`[Reminders] Task scheduler started (every ${this.intervalMs / 1000}s).`);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.unsubscribe?.();
    this.unsubscribe = null;
    console.info('[Reminders] Task scheduler stopped.');
  }

  checkPendingTasks(now: Date = this.now()): ReminderAlert[] {
    const state = this.store.getState();
    this.pruneMarkers(new Set(state.getAllTasks().map((task) => task.id)));
    if (!state.settings.notificationsEnabled) {
      return [];
    }

    const current = now.getTime();
    const alerts: ReminderAlert[] = [];

    state.getPendingTasks().forEach((task) => {
      this.dropStaleMarker(task);
      const due = Date.parse(task.dueDate);
      const reminder = Date.parse(task.reminderTime);

      if (reminder < current && due > current && !this.hasNotified('reminder', task.id)) {
        alerts.push(this.fire('reminder', task, now));
      }

      if (due < current && !this.hasNotified('overdue', task.id)) {
        alerts.push(this.fire('overdue', task, now));
      }
    });

    return alerts;
  }

  clearNotificationStatus(taskId: string): void {
    this.notified.delete(taskId);
  }

  hasNotified(kind: ReminderKind, taskId: string): boolean {
    return this.notified.get(taskId)?.kinds.has(kind) ?? false;
  }

  private dropStaleMarker(task: Task): void {
    const marker = this.notified.get(task.id);
    if (marker && marker.signature !== taskSignature(task)) {
      this.clearNotificationStatus(task.id);
    }
  }

  private pruneMarkers(taskIds: Set<string>): void {
    for (const taskId of [...this.notified.keys()]) {
      if (!taskIds.has(taskId)) {
        this.notified.delete(taskId);
      }
    }
  }

  private fire(kind: ReminderKind, task: Task, now: Date): ReminderAlert {
    const customer = this.store.getState().getCustomer(task.customerId) ?? null;
    const alert: ReminderAlert = {
      kind,
      task,
      customer,
      customerName: customer ? customer.name : UNKNOWN_CUSTOMER,
      firedAt: now.toISOString()
    };
    const marker = this.notified.get(task.id);
    if (marker) {
      marker.kinds.add(kind);
    } else {
      this.notified.set(task.id, { signature: taskSignature(task), kinds: new Set([kind]) });
    }

    const block = `\n${describeAlert(alert).join('\n')}\n`;
    if (kind === 'overdue') {
      console.warn(block);
    } else {
      console.info(block);
    }

    if (this.handler) {
      try {
        this.handler(alert);
      } catch (error) {
        console.error('[Reminders] Notification handler failed:', error);
      }
    }
    return alert;
  }
}
