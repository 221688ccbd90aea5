import assert from 'node:assert/strict';
import { describe, test } from 'node:test';

import type { Task } from '../src/models/Task';
import {
  collectReminderUpdates,
  keyedMessages,
  validateCommunicationInput,
  validateCustomerInput,
  validateReminderTime,
  validateTaskInput
} from '../src/services/FormValidation';
import { INVALID_DATE_MESSAGE } from '../src/utils/dates';

describe('validateCustomerInput', () => {
  test('requires name and email', () => {
    assert.deepEqual(validateCustomerInput({ name: '  ', email: '' }), {
      ok: false,
      errors: ['Name is required.', 'Email is required.']
    });
  });

  test('trims and fills optional fields', () => {
    assert.deepEqual(validateCustomerInput({ name: ' Mina Okafor ', email: 'mina@example.test' }), {
      ok: true,
      value: {
        name: 'Mina Okafor',
        email: 'mina@example.test',
        phone: '',
        role: '',
        notes: ''
      }
    });
  });
});

describe('validateTaskInput', () => {
  test('lists every missing field', () => {
    assert.deepEqual(validateTaskInput({ customerId: '', description: '', dueDate: '' }), {
      ok: false,
      errors: ['Please select a customer.', 'Description is required.', 'Due date is required.']
    });
  });

  test('rejects a due date that does not parse', () => {
    assert.deepEqual(
      validateTaskInput({ customerId: 'c-1', description: 'Call back', dueDate: '2026-02-30 10:00' }),
      { ok: false, errors: [INVALID_DATE_MESSAGE] }
    );
  });

  test('parses the due date and defaults the priority', () => {
    const result = validateTaskInput({
      customerId: 'c-1',
      description: ' Call back ',
      dueDate: '2026-06-01 09:00'
    });
    assert.ok(result.ok);
    assert.equal(result.value.description, 'Call back');
    assert.equal(result.value.priority, 'medium');
    assert.equal(result.value.dueDate.getTime(), new Date(2026, 5, 1, 9, 0).getTime());
  });

  test('rejects an unknown priority', () => {
    const result = validateTaskInput({
      customerId: 'c-1',
      description: 'Call back',
      dueDate: '2026-06-01 09:00',
      priority: 'urgent'
    });
    assert.equal(result.ok, false);
    assert.equal(result.ok ? 0 : result.errors.length, 1);
  });
});

describe('validateCommunicationInput', () => {
  test('splits tags and trims notes', () => {
    assert.deepEqual(
      validateCommunicationInput({ customerId: 'c-1', type: 'email', notes: ' Sent pricing ', tags: 'pricing, q3' }),
      {
        ok: true,
        value: { customerId: 'c-1', type: 'email', notes: 'Sent pricing', tags: ['pricing', 'q3'] }
      }
    );
  });

  test('requires a customer and notes', () => {
    assert.deepEqual(validateCommunicationInput({ customerId: '', type: 'phone', notes: ' ' }), {
      ok: false,
      errors: ['Please select a customer.', 'Notes are required.']
    });
  });
});

describe('validateReminderTime', () => {
  test('combines date and slot', () => {
    const result = validateReminderTime({ date: '2026-04-10', time: '09:30' });
    assert.ok(result.ok);
    assert.equal(result.value.getTime(), new Date(2026, 3, 10, 9, 30).getTime());
  });

  test('reports missing and invalid values', () => {
    assert.deepEqual(validateReminderTime({ date: '', time: '09:30' }), {
      ok: false,
      errors: ['Reminder date is required.']
    });
    assert.deepEqual(validateReminderTime({ date: '2026-02-30', time: '10:00' }), {
      ok: false,
      errors: [INVALID_DATE_MESSAGE]
    });
  });
});

const makeTask = (id: string, description: string): Task => ({
  id,
  customerId: 'c-1',
  description,
  dueDate: new Date(2026, 3, 12, 9, 0).toISOString(),
  completed: false,
  priority: 'medium',
  reminderTime: new Date(2026, 3, 11, 9, 45).toISOString()
});

describe('collectReminderUpdates', () => {
  const tasks = [makeTask('t-1', 'Call back'), makeTask('t-2', 'Send quote'), makeTask('t-3', 'Send quote')];

  test('only edited tasks are updated', () => {
    const result = collectReminderUpdates(
      tasks,
      {
        't-1': { date: '2026-04-10', time: '14:30' },
        't-2': { date: '2026-04-11', time: '09:45' }
      },
      new Set(['t-1'])
    );
    assert.deepEqual(result, {
      ok: true,
      value: [{ taskId: 't-1', reminderTime: new Date(2026, 3, 10, 14, 30).toISOString() }]
    });
  });

  test('nothing edited means nothing to update', () => {
    assert.deepEqual(collectReminderUpdates(tasks, {}, new Set()), { ok: true, value: [] });
  });

  test('keeps repeated messages for tasks with the same description', () => {
    const result = collectReminderUpdates(
      tasks,
      { 't-2': { date: '', time: '09:00' }, 't-3': { date: '', time: '09:00' } },
      new Set(['t-2', 't-3'])
    );
    assert.deepEqual(result, {
      ok: false,
      errors: ['Send quote: Reminder date is required.', 'Send quote: Reminder date is required.']
    });
  });
});

test('keyedMessages gives repeated messages distinct keys', () => {
  assert.deepEqual(keyedMessages(['Date is required.', 'Date is required.']), [
    { key: '0-Date is required.', message: 'Date is required.' },
    { key: '1-Date is required.', message: 'Date is required.' }
  ]);
});
