import { z } from 'zod';
import type { CrmConfig, CrmSettings } from '../models/Config';
import { CrmConfigSchema } from '../models/Config';
import { CommunicationTypeSchema } from '../models/Communication';
import { TaskPrioritySchema } from '../models/Task';

import crmConfig from '../data/config/crm.json';
import sampleSeed from '../data/seed/sample.json';

const SeedCommunicationSchema = z.object({
  type: CommunicationTypeSchema,
  notes: z.string(),
  tags: z.array(z.string()).default([])
});

const SeedTaskSchema = z.object({
  description: z.string(),
  dueInDays: z.number(),
  priority: TaskPrioritySchema.default('medium')
});

const SeedCustomerSchema = z.object({
  name: z.string().min(1),
  email: z.string().min(1),
  phone: z.string().default(''),
  role: z.string().default(''),
  notes: z.string().default(''),
  communications: z.array(SeedCommunicationSchema).default([]),
  tasks: z.array(SeedTaskSchema).default([])
});

export const SampleSeedSchema = z.object({
  version: z.number(),
  customers: z.array(SeedCustomerSchema)
});

export type SampleSeed = z.infer<typeof SampleSeedSchema>;

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');

let cachedConfig: CrmConfig | null = null;

export const parseCrmConfig = (raw: unknown): CrmConfig => {
  const parsed = CrmConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid CRM configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

export const loadCrmConfig = (): CrmConfig => {
  if (!cachedConfig) {
    cachedConfig = parseCrmConfig(crmConfig);
  }
  return cachedConfig;
};

export const settingsFromConfig = (config: CrmConfig): CrmSettings => ({
  notificationsEnabled: config.reminders.notificationsEnabled,
  reminderLeadHours: { ...config.reminders.leadHours }
});

export const parseSampleSeed = (raw: unknown): SampleSeed => {
  const parsed = SampleSeedSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid sample data: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

export const loadSampleSeed = (): SampleSeed => parseSampleSeed(sampleSeed);
