import type { CrmStore } from '../app/store/crmStore';
import type { ReminderLeadHours } from '../models/Task';
import { addDays } from '../utils/dates';
import { createCommunication, createCustomer, createTask } from './CrmFactory';
import type { SampleSeed } from './DataLoader';
import { loadSampleSeed } from './DataLoader';

export type SeedSummary = {
  customers: number;
  communications: number;
  tasks: number;
};

/**
 * Loads the sample customers into the store. Task due dates are offsets in
 * days from `now`; reminder times follow the store's lead hours unless
 * `leadHours` is given.
 */
export const seedSampleData = (
  store: CrmStore,
  now: Date = new Date(),
  seed: SampleSeed = loadSampleSeed(),
  leadHours: ReminderLeadHours = store.getState().settings.reminderLeadHours
): SeedSummary => {
  const summary: SeedSummary = { customers: 0, communications: 0, tasks: 0 };
  const state = store.getState();

  seed.customers.forEach((entry) => {
    const customer = createCustomer({
      name: entry.name,
      email: entry.email,
      phone: entry.phone,
      role: entry.role,
      notes: entry.notes
    });
    state.addCustomer(customer);
    summary.customers += 1;

    entry.communications.forEach((communication) => {
      state.addCommunication(
        createCommunication(
          {
            customerId: customer.id,
            type: communication.type,
            notes: communication.notes,
            tags: communication.tags
          },
          now
        )
      );
      summary.communications += 1;
    });

    entry.tasks.forEach((task) => {
      state.addTask(
        createTask(
          {
            customerId: customer.id,
            description: task.description,
            dueDate: addDays(now, task.dueInDays),
            priority: task.priority
          },
          leadHours
        )
      );
      summary.tasks += 1;
    });
  });

  console.info(
    `[Seed] Loaded ${summary.customers} customers, ${summary.communications} communications, ${summary.tasks} tasks.`
  );
  return summary;
};
