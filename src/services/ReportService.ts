import type { Communication, CommunicationType } from '../models/Communication';
import type { Customer } from '../models/Customer';
import type { Task } from '../models/Task';
import { addDays, addMonths, formatMonthDay, formatMonthYear } from '../utils/dates';

export type ReportPeriod = 'Daily' | 'Weekly' | 'Monthly';

export const REPORT_PERIODS: ReportPeriod[] = ['Daily', 'Weekly', 'Monthly'];

export type FrequencyBucket = { label: string } & Record<CommunicationType, number>;

export type CommunicationStats = {
  totalCommunications: number;
};

export type TaskCompletionStats = {
  totalTasks: number;
  completedTasks: number;
};

export type CustomerActivity = {
  customerId: string;
  name: string;
  communications: number;
  tasks: number;
  completedTasks: number;
  completionRate: number;
};

const DAILY_BUCKETS = 7;
const WEEKLY_BUCKETS = 4;
const MONTHLY_BUCKETS = 6;

const emptyBucket = (label: string): FrequencyBucket => ({
  label,
  phone: 0,
  email: 0,
  meeting: 0
});

export const getCommunicationStats = (communications: Communication[]): CommunicationStats => ({
  totalCommunications: communications.length
});

export const getTaskCompletionStats = (tasks: Task[]): TaskCompletionStats => ({
  totalTasks: tasks.length,
  completedTasks: tasks.filter((task) => task.completed).length
});

/** Buckets keyed by label; communications whose label has no bucket are dropped. */
const countByLabel = (
  buckets: FrequencyBucket[],
  communications: Communication[],
  since: number,
  labelOf: (date: Date) => string
): FrequencyBucket[] => {
  const byLabel = new Map(buckets.map((bucket) => [bucket.label, bucket]));
  communications.forEach((communication) => {
    const timestamp = new Date(communication.timestamp);
    if (!(timestamp.getTime() > since)) {
      return;
    }
    const bucket = byLabel.get(labelOf(timestamp));
    if (bucket) {
      bucket[communication.type] += 1;
    }
  });
  return buckets;
};

const buildDaily = (communications: Communication[], now: Date): FrequencyBucket[] => {
  const buckets: FrequencyBucket[] = [];
  for (let offset = DAILY_BUCKETS - 1; offset >= 0; offset -= 1) {
    buckets.push(emptyBucket(formatMonthDay(addDays(now, -offset))));
  }
  return countByLabel(
    buckets,
    communications,
    addDays(now, -DAILY_BUCKETS).getTime(),
    formatMonthDay
  );
};

const weekLabel = (now: Date, weeksAgo: number): string =>
  `Week ${WEEKLY_BUCKETS - weeksAgo} (${formatMonthDay(addDays(now, -7 * weeksAgo))})`;

/**
 * Week 4 holds the last seven days, week 1 the oldest. Anything between
 * three and four weeks old lands in week 1.
 */
const buildWeekly = (communications: Communication[], now: Date): FrequencyBucket[] => {
  const buckets: FrequencyBucket[] = [];
  for (let weeksAgo = WEEKLY_BUCKETS - 1; weeksAgo >= 0; weeksAgo -= 1) {
    buckets.push(emptyBucket(weekLabel(now, weeksAgo)));
  }
  const since = addDays(now, -7 * WEEKLY_BUCKETS).getTime();
  communications.forEach((communication) => {
    const time = Date.parse(communication.timestamp);
    if (!(time > since)) {
      return;
    }
    let weeksAgo = WEEKLY_BUCKETS - 1;
    for (let candidate = 0; candidate < WEEKLY_BUCKETS - 1; candidate += 1) {
      if (time > addDays(now, -7 * (candidate + 1)).getTime()) {
        weeksAgo = candidate;
        break;
      }
    }
    buckets[WEEKLY_BUCKETS - 1 - weeksAgo][communication.type] += 1;
  });
  return buckets;
};

const buildMonthly = (communications: Communication[], now: Date): FrequencyBucket[] => {
  const buckets: FrequencyBucket[] = [];
  for (let offset = MONTHLY_BUCKETS - 1; offset >= 0; offset -= 1) {
    buckets.push(emptyBucket(formatMonthYear(addMonths(now, -offset))));
  }
  return countByLabel(
    buckets,
    communications,
    addMonths(now, -MONTHLY_BUCKETS).getTime(),
    formatMonthYear
  );
};

/** Communication counts per type for the chosen period, oldest bucket first. */
export const buildCommunicationFrequency = (
  communications: Communication[],
  period: ReportPeriod,
  now: Date = new Date()
): FrequencyBucket[] => {
  switch (period) {
    case 'Daily':
      return buildDaily(communications, now);
    case 'Weekly':
      return buildWeekly(communications, now);
    case 'Monthly':
      return buildMonthly(communications, now);
  }
};

export const buildCustomerActivity = (
  customers: Customer[],
  communications: Record<string, Communication[]>,
  tasks: Record<string, Task[]>
): CustomerActivity[] =>
  customers.map((customer) => {
    const customerTasks = tasks[customer.id] ?? [];
    const completedTasks = customerTasks.filter((task) => task.completed).length;
    return {
      customerId: customer.id,
      name: customer.name,
      communications: (communications[customer.id] ?? []).length,
      tasks: customerTasks.length,
      completedTasks,
      completionRate:
        customerTasks.length === 0 ? 0 : Math.round((completedTasks / customerTasks.length) * 100)
    };
  });
