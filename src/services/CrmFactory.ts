import type { Communication, CommunicationDraft } from '../models/Communication';
import type { Customer, CustomerDraft } from '../models/Customer';
import type { ReminderLeadHours, Task, TaskDraft, TaskPriority } from '../models/Task';
import { addHours } from '../utils/dates';

export const DEFAULT_LEAD_HOURS: ReminderLeadHours = {
  high: 48,
  medium: 24,
  low: 12
};

const createId = (): string => crypto.randomUUID();

export const normalizeTags = (tags: string[]): string[] =>
  tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0);

/** Splits the comma separated tag field of the communication dialogs. */
export const parseTagInput = (value: string): string[] => normalizeTags(value.split(','));

export const defaultReminderTime = (
  dueDate: Date,
  priority: TaskPriority,
  leadHours: ReminderLeadHours = DEFAULT_LEAD_HOURS
): Date => addHours(dueDate, -leadHours[priority]);

export const createCustomer = (draft: CustomerDraft): Customer => ({
  id: createId(),
  name: draft.name,
  email: draft.email,
  phone: draft.phone,
  role: draft.role,
  notes: draft.notes ?? ''
});

export const createCommunication = (
  draft: CommunicationDraft,
  now: Date = new Date()
): Communication => ({
  id: createId(),
  customerId: draft.customerId,
  type: draft.type,
  timestamp: now.toISOString(),
  notes: draft.notes,
  tags: normalizeTags(draft.tags ?? [])
});

export const createTask = (
  draft: TaskDraft,
  leadHours: ReminderLeadHours = DEFAULT_LEAD_HOURS
): Task => {
  const priority = draft.priority ?? 'medium';
  return {
    id: createId(),
    customerId: draft.customerId,
    description: draft.description,
    dueDate: draft.dueDate.toISOString(),
    completed: false,
    priority,
    reminderTime: defaultReminderTime(draft.dueDate, priority, leadHours).toISOString()
  };
};
