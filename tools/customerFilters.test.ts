import assert from 'node:assert/strict';
import { describe, test } from 'node:test';

import type { Communication } from '../src/models/Communication';
import type { Customer } from '../src/models/Customer';
import {
  ALL_CUSTOMERS_FILTER,
  NO_COMMUNICATIONS_FILTER,
  WITH_COMMUNICATIONS_FILTER
} from '../src/models/Customer';
import { buildCustomerFilterOptions } from '../src/services/FilterDefinitions';
import {
  emailContains,
  filterCustomerList,
  filterCustomers,
  hasRole,
  nameContains,
  phoneContains,
  searchCustomers
} from '../src/services/FilterService';

const makeCustomer = (overrides: Partial<Customer>): Customer => ({
  id: overrides.id ?? 'c',
  name: 'Customer',
  email: 'customer@example.test',
  phone: '',
  role: 'Client',
  notes: '',
  ...overrides
});

const customers: Customer[] = [
  makeCustomer({ id: 'c-1', name: 'Mina Okafor', email: 'mina@northwind.test', phone: '555-0100', role: 'Client' }),
  makeCustomer({
    id: 'c-2',
    name: 'Tomas Lind',
    email: 'tomas@lind.test',
    phone: '555-0199',
    role: 'Prospect',
    notes: 'Asked about the northwind integration'
  }),
  makeCustomer({ id: 'c-3', name: 'Ruth Abara', email: 'ruth@abara.test', role: 'Partner' })
];

const communications: Record<string, Communication[]> = {
  'c-1': [
    {
      id: 'm-1',
      customerId: 'c-1',
      type: 'email',
      timestamp: new Date(2026, 0, 1).toISOString(),
      notes: 'Welcome',
      tags: []
    }
  ],
  'c-3': []
};

const ids = (list: Customer[]): string[] => list.map((customer) => customer.id);

describe('searchCustomers', () => {
  test('matches any field, case-insensitive', () => {
    assert.deepEqual(ids(searchCustomers(customers, 'NORTHWIND')), ['c-1', 'c-2']);
    assert.deepEqual(ids(searchCustomers(customers, '0199')), ['c-2']);
  });

  test('combines with an exact role', () => {
    assert.deepEqual(ids(searchCustomers(customers, 'northwind', 'Prospect')), ['c-2']);
    assert.deepEqual(ids(searchCustomers(customers, '', 'Partner')), ['c-3']);
  });

  test('All Roles and empty search return everything', () => {
    assert.deepEqual(ids(searchCustomers(customers, null, 'All Roles')), ['c-1', 'c-2', 'c-3']);
    assert.deepEqual(ids(searchCustomers(customers, undefined)), ['c-1', 'c-2', 'c-3']);
  });
});

describe('filterCustomerList', () => {
  test('communication options', () => {
    assert.deepEqual(ids(filterCustomerList(customers, ALL_CUSTOMERS_FILTER, '', communications)), [
      'c-1',
      'c-2',
      'c-3'
    ]);
    assert.deepEqual(
      ids(filterCustomerList(customers, WITH_COMMUNICATIONS_FILTER, '', communications)),
      ['c-1']
    );
    assert.deepEqual(
      ids(filterCustomerList(customers, NO_COMMUNICATIONS_FILTER, '', communications)),
      ['c-2', 'c-3']
    );
  });

  test('any other option is a role', () => {
    assert.deepEqual(ids(filterCustomerList(customers, 'Partner', '', communications)), ['c-3']);
    assert.deepEqual(ids(filterCustomerList(customers, 'Reseller', '', communications)), []);
  });

  test('search text narrows after the option and skips the phone', () => {
    assert.deepEqual(
      ids(filterCustomerList(customers, ALL_CUSTOMERS_FILTER, ' northwind ', communications)),
      ['c-1', 'c-2']
    );
    assert.deepEqual(
      ids(filterCustomerList(customers, NO_COMMUNICATIONS_FILTER, 'northwind', communications)),
      ['c-2']
    );
    assert.deepEqual(ids(filterCustomerList(customers, ALL_CUSTOMERS_FILTER, '0199', communications)), []);
  });
});

test('predicates', () => {
  assert.deepEqual(ids(filterCustomers(customers, nameContains('lind'))), ['c-2']);
  assert.deepEqual(ids(filterCustomers(customers, emailContains('ABARA'))), ['c-3']);
  assert.deepEqual(ids(filterCustomers(customers, phoneContains('555'))), ['c-1', 'c-2']);
  assert.deepEqual(ids(filterCustomers(customers, hasRole('Client'))), ['c-1']);
});

test('customer filter options wrap the roles', () => {
  assert.deepEqual(buildCustomerFilterOptions(['Client', 'Prospect']), [
    'All Customers',
    'Client',
    'Prospect',
    'With Communications',
    'No Communications'
  ]);
});
