import { z } from 'zod';
import type { ReminderTimeUpdate } from '../app/store/crmStore';
import { CommunicationTypeSchema } from '../models/Communication';
import type { CommunicationDraft } from '../models/Communication';
import { CustomerInputSchema } from '../models/Customer';
import type { CustomerDraft } from '../models/Customer';
import { TaskPrioritySchema } from '../models/Task';
import type { Task, TaskDraft } from '../models/Task';
import { INVALID_DATE_MESSAGE, combineDateAndTime, parseDateTimeInput } from '../utils/dates';
import { parseTagInput } from './CrmFactory';

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[] };

const CUSTOMER_REQUIRED_MESSAGE = 'Please select a customer.';

const dateTimeField = (requiredMessage: string) =>
  z
    .string()
    .trim()
    .min(1, requiredMessage)
    .transform((value, ctx) => {
      const parsed = parseDateTimeInput(value);
      if (!parsed) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: INVALID_DATE_MESSAGE });
        return z.NEVER;
      }
      return parsed;
    });

export const TaskInputSchema = z.object({
  customerId: z.string().min(1, CUSTOMER_REQUIRED_MESSAGE),
  description: z.string().trim().min(1, 'Description is required.'),
  dueDate: dateTimeField('Due date is required.'),
  priority: TaskPrioritySchema.default('medium')
});

export const CommunicationInputSchema = z.object({
  customerId: z.string().min(1, CUSTOMER_REQUIRED_MESSAGE),
  type: CommunicationTypeSchema,
  notes: z.string().trim().min(1, 'Notes are required.'),
  tags: z.string().default('').transform(parseTagInput)
});

export const ReminderTimeSchema = z
  .object({
    date: z.string().min(1, 'Reminder date is required.'),
    time: z.string().min(1, 'Reminder time is required.')
  })
  .transform((value, ctx) => {
    const combined = combineDateAndTime(value.date, value.time);
    if (!combined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: INVALID_DATE_MESSAGE });
      return z.NEVER;
    }
    return combined;
  });

export type TaskInput = z.input<typeof TaskInputSchema>;
export type CommunicationInput = z.input<typeof CommunicationInputSchema>;
export type ReminderTimeInput = z.input<typeof ReminderTimeSchema>;

const toResult = <I, T>(parsed: z.SafeParseReturnType<I, T>): ValidationResult<T> =>
  parsed.success
    ? { ok: true, value: parsed.data }
    : { ok: false, errors: parsed.error.issues.map((issue) => issue.message) };

export const validateCustomerInput = (input: unknown): ValidationResult<CustomerDraft> =>
  toResult(CustomerInputSchema.safeParse(input));

export const validateTaskInput = (input: unknown): ValidationResult<TaskDraft> =>
  toResult(TaskInputSchema.safeParse(input));

export const validateCommunicationInput = (
  input: unknown
): ValidationResult<CommunicationDraft> => toResult(CommunicationInputSchema.safeParse(input));

export const validateReminderTime = (input: unknown): ValidationResult<Date> =>
  toResult(ReminderTimeSchema.safeParse(input));

/**
 * Validates the reminder drafts of the edited tasks. Tasks missing from
 * `edited` keep their stored reminder time. Messages name the task.
 */
export const collectReminderUpdates = (
  tasks: Task[],
  drafts: Record<string, ReminderTimeInput>,
  edited: ReadonlySet<string>
): ValidationResult<ReminderTimeUpdate[]> => {
  const updates: ReminderTimeUpdate[] = [];
  const errors: string[] = [];
  tasks
    .filter((task) => edited.has(task.id))
    .forEach((task) => {
      const result = validateReminderTime(drafts[task.id] ?? {});
      if (result.ok) {
        updates.push({ taskId: task.id, reminderTime: result.value.toISOString() });
      } else {
        errors.push(...result.errors.map((error) => `${task.description}: ${error}`));
      }
    });
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: updates };
};

/** Stable list keys for messages that may repeat. */
export const keyedMessages = (messages: string[]): { key: string; message: string }[] =>
  messages.map((message, index) => ({ key: `${index}-${message}`, message }));
