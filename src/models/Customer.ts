import { z } from 'zod';

export const CustomerSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  phone: z.string(),
  role: z.string(),
  notes: z.string()
});

export const CustomerInputSchema = z.object({
  name: z.string().trim().min(1, 'Name is required.'),
  email: z.string().trim().min(1, 'Email is required.'),
  phone: z.string().trim().default(''),
  role: z.string().trim().default(''),
  notes: z.string().default('')
});

export type Customer = z.infer<typeof CustomerSchema>;
export type CustomerDraft = Omit<Customer, 'id' | 'notes'> & { notes?: string };
export type CustomerInput = z.input<typeof CustomerInputSchema>;

export const ALL_CUSTOMERS_FILTER = 'All Customers';
export const WITH_COMMUNICATIONS_FILTER = 'With Communications';
export const NO_COMMUNICATIONS_FILTER = 'No Communications';
export const ALL_ROLES = 'All Roles';
