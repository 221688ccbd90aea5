import { ALL_TYPES_FILTER, COMMUNICATION_TYPES } from '../models/Communication';
import type { CommunicationType } from '../models/Communication';
import {
  ALL_CUSTOMERS_FILTER,
  NO_COMMUNICATIONS_FILTER,
  WITH_COMMUNICATIONS_FILTER
} from '../models/Customer';

export type CommunicationTypeFilter = CommunicationType | typeof ALL_TYPES_FILTER;

export const buildCustomerFilterOptions = (roles: string[]): string[] => [
  ALL_CUSTOMERS_FILTER,
  ...roles,
  WITH_COMMUNICATIONS_FILTER,
  NO_COMMUNICATIONS_FILTER
];

export const COMMUNICATION_TYPE_FILTERS: CommunicationTypeFilter[] = [
  ALL_TYPES_FILTER,
  ...COMMUNICATION_TYPES
];

export const isCommunicationTypeFilter = (value: string): value is CommunicationTypeFilter =>
  value === ALL_TYPES_FILTER || COMMUNICATION_TYPES.some((type) => type === value);
