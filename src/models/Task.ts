import { z } from 'zod';

export const TaskPrioritySchema = z.enum(['low', 'medium', 'high']);

export const TaskSchema = z.object({
  id: z.string(),
  customerId: z.string(),
  description: z.string(),
  dueDate: z.string(),
  completed: z.boolean(),
  priority: TaskPrioritySchema,
  reminderTime: z.string()
});

export type TaskPriority = z.infer<typeof TaskPrioritySchema>;
export type Task = z.infer<typeof TaskSchema>;

export type TaskDraft = {
  customerId: string;
  description: string;
  dueDate: Date;
  priority?: TaskPriority;
};

/** Hours between the reminder and the due date, per priority. */
export type ReminderLeadHours = Record<TaskPriority, number>;

export const TASK_PRIORITIES: TaskPriority[] = TaskPrioritySchema.options;

export const PRIORITY_LABELS: Record<TaskPriority, string> = {
  low: 'Low',
  medium: 'Medium',
  high: 'High'
};
