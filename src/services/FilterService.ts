import type { Communication } from '../models/Communication';
import { ALL_TYPES_FILTER } from '../models/Communication';
import type { Customer } from '../models/Customer';
import {
  ALL_CUSTOMERS_FILTER,
  ALL_ROLES,
  NO_COMMUNICATIONS_FILTER,
  WITH_COMMUNICATIONS_FILTER
} from '../models/Customer';
import type { Task } from '../models/Task';
import { addDays } from '../utils/dates';
import type { CommunicationTypeFilter } from './FilterDefinitions';

export type CustomerPredicate = (customer: Customer) => boolean;

export type TaskPredicate = (task: Task) => boolean;

export type CommunicationSearch = {
  customerId?: string;
  type?: CommunicationTypeFilter;
  tagSearch?: string;
};

export type TaskSearch = {
  customerId?: string;
  showCompleted: boolean;
};

export const ACTIVE_CUSTOMER_DAYS = 90;

const contains = (value: string, needle: string): boolean =>
  value.toLowerCase().includes(needle.toLowerCase());

const communicationsOf = (
  communications: Record<string, Communication[]>,
  customerId: string
): Communication[] => communications[customerId] ?? [];

/**
 * Free-text search over every customer field plus an exact role filter.
 * `All Roles` (or no role) disables the role filter.
 */
export const searchCustomers = (
  customers: Customer[],
  searchTerm: string | null | undefined,
  role?: string | null
): Customer[] => {
  const term = (searchTerm ?? '').toLowerCase();
  const filterByRole = Boolean(role) && role !== ALL_ROLES;
  return customers.filter((customer) => {
    const matchesSearch =
      !term ||
      contains(customer.name, term) ||
      contains(customer.email, term) ||
      contains(customer.phone, term) ||
      contains(customer.role, term) ||
      contains(customer.notes, term);
    const matchesRole = !filterByRole || customer.role === role;
    return matchesSearch && matchesRole;
  });
};

/**
 * Customers tab: the dropdown option narrows first, then the search text
 * matches name, email, role or notes. Any option that is not one of the
 * fixed ones is treated as a role.
 */
export const filterCustomerList = (
  customers: Customer[],
  option: string,
  searchText: string,
  communications: Record<string, Communication[]>
): Customer[] => {
  let filtered: Customer[];
  switch (option) {
    case ALL_CUSTOMERS_FILTER:
      filtered = customers.slice();
      break;
    case WITH_COMMUNICATIONS_FILTER:
      filtered = customers.filter(
        (customer) => communicationsOf(communications, customer.id).length > 0
      );
      break;
    case NO_COMMUNICATIONS_FILTER:
      filtered = customers.filter(
        (customer) => communicationsOf(communications, customer.id).length === 0
      );
      break;
    default:
      filtered = customers.filter((customer) => customer.role === option);
  }

  const normalized = searchText.trim();
  if (!normalized) {
    return filtered;
  }
  return filtered.filter(
    (customer) =>
      contains(customer.name, normalized) ||
      contains(customer.email, normalized) ||
      contains(customer.role, normalized) ||
      contains(customer.notes, normalized)
  );
};

export const filterCustomers = (
  customers: Customer[],
  predicate: CustomerPredicate
): Customer[] => customers.filter(predicate);

export const filterTasks = (tasks: Task[], predicate: TaskPredicate): Task[] =>
  tasks.filter(predicate);

export const nameContains = (text: string): CustomerPredicate => (customer) =>
  contains(customer.name, text);

export const emailContains = (text: string): CustomerPredicate => (customer) =>
  contains(customer.email, text);

export const phoneContains = (text: string): CustomerPredicate => (customer) =>
  contains(customer.phone, text);

export const hasRole = (role: string): CustomerPredicate => (customer) =>
  customer.role === role;

export const hasRecentCommunication = (
  communications: Record<string, Communication[]>,
  days: number,
  now: Date = new Date()
): CustomerPredicate => {
  const cutoff = addDays(now, -days).getTime();
  return (customer) =>
    communicationsOf(communications, customer.id).some(
      (communication) => Date.parse(communication.timestamp) > cutoff
    );
};

export const hasPendingTasks = (tasks: Record<string, Task[]>): CustomerPredicate => (
  customer
) => (tasks[customer.id] ?? []).some((task) => !task.completed);

export const isActiveCustomer = (
  customer: Customer,
  communications: Record<string, Communication[]>,
  now: Date = new Date()
): boolean => hasRecentCommunication(communications, ACTIVE_CUSTOMER_DAYS, now)(customer);

/** Customers whose first logged communication falls within the last `days`. */
export const recentCustomers = (
  customers: Customer[],
  communications: Record<string, Communication[]>,
  days: number,
  now: Date = new Date()
): Customer[] => {
  const cutoff = addDays(now, -days).getTime();
  return customers.filter((customer) => {
    const timestamps = communicationsOf(communications, customer.id).map((communication) =>
      Date.parse(communication.timestamp)
    );
    return timestamps.length > 0 && Math.min(...timestamps) > cutoff;
  });
};

const selectGroups = <T,>(
  grouped: Record<string, T[]>,
  customerId?: string
): T[][] => (customerId ? [grouped[customerId] ?? []] : Object.values(grouped));

export const searchCommunications = (
  communications: Record<string, Communication[]>,
  { customerId, type, tagSearch }: CommunicationSearch
): Communication[] => {
  const tagNeedle = (tagSearch ?? '').trim();
  return selectGroups(communications, customerId)
    .flat()
    .filter((communication) => {
      const matchesType = !type || type === ALL_TYPES_FILTER || communication.type === type;
      const matchesTag =
        !tagNeedle || communication.tags.some((tag) => contains(tag, tagNeedle));
      return matchesType && matchesTag;
    });
};

export const searchTasks = (
  tasks: Record<string, Task[]>,
  { customerId, showCompleted }: TaskSearch
): Task[] =>
  selectGroups(tasks, customerId)
    .flat()
    .filter((task) => showCompleted || !task.completed);
