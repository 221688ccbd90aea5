import assert from 'node:assert/strict';
import { describe, test } from 'node:test';

import type { Communication, CommunicationType } from '../src/models/Communication';
import type { Customer } from '../src/models/Customer';
import type { Task } from '../src/models/Task';
import {
  buildCommunicationFrequency,
  buildCustomerActivity,
  getCommunicationStats,
  getTaskCompletionStats
} from '../src/services/ReportService';
import type { FrequencyBucket } from '../src/services/ReportService';

const now = new Date(2026, 5, 15, 12, 0);

let sequence = 0;
const makeCommunication = (type: CommunicationType, at: Date, customerId = 'c-1'): Communication => {
  sequence += 1;
  return {
    id: `m-${sequence}`,
    customerId,
    type,
    timestamp: at.toISOString(),
    notes: 'Note',
    tags: []
  };
};

const makeTask = (id: string, customerId: string, completed: boolean): Task => ({
  id,
  customerId,
  description: 'Follow up',
  dueDate: now.toISOString(),
  completed,
  priority: 'low',
  reminderTime: now.toISOString()
});

const counts = (buckets: FrequencyBucket[]): string[] =>
  buckets.map((bucket) => `${bucket.label} ${bucket.phone}/${bucket.email}/${bucket.meeting}`);

describe('buildCommunicationFrequency', () => {
  test('daily covers the last seven days, oldest first', () => {
    const buckets = buildCommunicationFrequency(
      [
        makeCommunication('phone', new Date(2026, 5, 15, 9, 0)),
        makeCommunication('email', new Date(2026, 5, 13, 10, 0)),
        makeCommunication('email', new Date(2026, 5, 13, 16, 0)),
        makeCommunication('meeting', new Date(2026, 5, 9, 8, 0)),
        makeCommunication('phone', new Date(2026, 5, 8, 11, 0))
      ],
      'Daily',
      now
    );
    assert.deepEqual(counts(buckets), [
      '06/09 0/0/1',
      '06/10 0/0/0',
      '06/11 0/0/0',
      '06/12 0/0/0',
      '06/13 0/2/0',
      '06/14 0/0/0',
      '06/15 1/0/0'
    ]);
  });

  test('weekly buckets by age in whole weeks', () => {
    const buckets = buildCommunicationFrequency(
      [
        makeCommunication('phone', new Date(2026, 5, 14, 9, 0)),
        makeCommunication('email', new Date(2026, 5, 5, 9, 0)),
        makeCommunication('meeting', new Date(2026, 4, 20, 9, 0)),
        makeCommunication('meeting', new Date(2026, 4, 10, 9, 0))
      ],
      'Weekly',
      now
    );
    assert.deepEqual(counts(buckets), [
      'Week 1 (05/25) 0/0/1',
      'Week 2 (06/01) 0/0/0',
      'Week 3 (06/08) 0/1/0',
      'Week 4 (06/15) 1/0/0'
    ]);
  });

  test('monthly covers six calendar months', () => {
    const buckets = buildCommunicationFrequency(
      [
        makeCommunication('email', new Date(2026, 1, 3, 9, 0)),
        makeCommunication('phone', new Date(2026, 5, 1, 9, 0)),
        makeCommunication('phone', new Date(2025, 11, 20, 9, 0))
      ],
      'Monthly',
      now
    );
    assert.deepEqual(counts(buckets), [
      'Jan 2026 0/0/0',
      'Feb 2026 0/1/0',
      'Mar 2026 0/0/0',
      'Apr 2026 0/0/0',
      'May 2026 0/0/0',
      'Jun 2026 1/0/0'
    ]);
  });

  test('monthly at the end of a month keeps six distinct months', () => {
    const endOfMarch = new Date(2026, 2, 31, 12, 0);
    const buckets = buildCommunicationFrequency(
      [
        makeCommunication('phone', new Date(2026, 1, 10, 9, 0)),
        makeCommunication('email', new Date(2025, 10, 30, 9, 0)),
        makeCommunication('meeting', new Date(2025, 9, 1, 9, 0)),
        makeCommunication('email', new Date(2025, 8, 30, 9, 0))
      ],
      'Monthly',
      endOfMarch
    );
    assert.deepEqual(counts(buckets), [
      'Oct 2025 0/0/1',
      'Nov 2025 0/1/0',
      'Dec 2025 0/0/0',
      'Jan 2026 0/0/0',
      'Feb 2026 1/0/0',
      'Mar 2026 0/0/0'
    ]);
  });

  test('daily across the new year', () => {
    const buckets = buildCommunicationFrequency(
      [
        makeCommunication('email', new Date(2025, 11, 30, 10, 0)),
        makeCommunication('phone', new Date(2026, 0, 1, 8, 0)),
        makeCommunication('meeting', new Date(2025, 11, 27, 9, 0))
      ],
      'Daily',
      new Date(2026, 0, 3, 12, 0)
    );
    assert.deepEqual(counts(buckets), [
      '12/28 0/0/0',
      '12/29 0/0/0',
      '12/30 0/1/0',
      '12/31 0/0/0',
      '01/01 1/0/0',
      '01/02 0/0/0',
      '01/03 0/0/0'
    ]);
  });

  test('weekly across the new year', () => {
    const buckets = buildCommunicationFrequency(
      [
        makeCommunication('email', new Date(2026, 0, 9, 9, 0)),
        makeCommunication('phone', new Date(2025, 11, 29, 9, 0)),
        makeCommunication('meeting', new Date(2025, 11, 15, 9, 0))
      ],
      'Weekly',
      new Date(2026, 0, 10, 12, 0)
    );
    assert.deepEqual(counts(buckets), [
      'Week 1 (12/20) 0/0/1',
      'Week 2 (12/27) 0/0/0',
      'Week 3 (01/03) 1/0/0',
      'Week 4 (01/10) 0/1/0'
    ]);
  });
});

test('summary statistics', () => {
  assert.deepEqual(
    getCommunicationStats([makeCommunication('phone', now), makeCommunication('email', now)]),
    { totalCommunications: 2 }
  );
  assert.deepEqual(
    getTaskCompletionStats([makeTask('t-1', 'c-1', true), makeTask('t-2', 'c-1', false)]),
    { totalTasks: 2, completedTasks: 1 }
  );
  assert.deepEqual(getTaskCompletionStats([]), { totalTasks: 0, completedTasks: 0 });
});

test('customer activity', () => {
  const customers: Customer[] = [
    { id: 'c-1', name: 'Mina Okafor', email: 'mina@example.test', phone: '', role: 'Client', notes: '' },
    { id: 'c-2', name: 'Tomas Lind', email: 'tomas@example.test', phone: '', role: 'Prospect', notes: '' }
  ];
  const activity = buildCustomerActivity(
    customers,
    { 'c-1': [makeCommunication('phone', now), makeCommunication('email', now)] },
    {
      'c-1': [
        makeTask('t-1', 'c-1', true),
        makeTask('t-2', 'c-1', false),
        makeTask('t-3', 'c-1', false)
      ]
    }
  );
  assert.deepEqual(activity, [
    {
      customerId: 'c-1',
      name: 'Mina Okafor',
      communications: 2,
      tasks: 3,
      completedTasks: 1,
      completionRate: 33
    },
    {
      customerId: 'c-2',
      name: 'Tomas Lind',
      communications: 0,
      tasks: 0,
      completedTasks: 0,
      completionRate: 0
    }
  ]);
});
