import { z } from 'zod';

const LeadHoursSchema = z.object({
  high: z.number().nonnegative(),
  medium: z.number().nonnegative(),
  low: z.number().nonnegative()
});

export const ReminderConfigSchema = z.object({
  notificationsEnabled: z.boolean(),
  checkIntervalMs: z.number().int().positive(),
  leadHours: LeadHoursSchema
});

export const CrmConfigSchema = z.object({
  version: z.number(),
  roles: z.array(z.string().min(1)).min(1),
  reminders: ReminderConfigSchema,
  sampleData: z.boolean()
});

export type ReminderConfig = z.infer<typeof ReminderConfigSchema>;
export type CrmConfig = z.infer<typeof CrmConfigSchema>;

export type CrmSettings = {
  notificationsEnabled: boolean;
  reminderLeadHours: z.infer<typeof LeadHoursSchema>;
};
