import { z } from 'zod';

export const CommunicationTypeSchema = z.enum(['phone', 'email', 'meeting']);

export const CommunicationSchema = z.object({
  id: z.string(),
  customerId: z.string(),
  type: CommunicationTypeSchema,
  timestamp: z.string(),
  notes: z.string(),
  tags: z.array(z.string())
});

export type CommunicationType = z.infer<typeof CommunicationTypeSchema>;
export type Communication = z.infer<typeof CommunicationSchema>;

export type CommunicationDraft = {
  customerId: string;
  type: CommunicationType;
  notes: string;
  tags?: string[];
};

export const COMMUNICATION_TYPES: CommunicationType[] = CommunicationTypeSchema.options;

export const COMMUNICATION_TYPE_LABELS: Record<CommunicationType, string> = {
  phone: 'Phone',
  email: 'Email',
  meeting: 'Meeting'
};

export const ALL_TYPES_FILTER = 'All Types';
