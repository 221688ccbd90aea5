import assert from 'node:assert/strict';
import { describe, test } from 'node:test';

import {
  loadCrmConfig,
  loadSampleSeed,
  parseCrmConfig,
  parseSampleSeed,
  settingsFromConfig
} from '../src/services/DataLoader';

const validConfig = () => ({
  version: 1,
  roles: ['Client'],
  reminders: {
    notificationsEnabled: true,
    checkIntervalMs: 1000,
    leadHours: { high: 8, medium: 4, low: 2 }
  },
  sampleData: false
});

describe('crm configuration', () => {
  test('loads the bundled defaults once', () => {
    const config = loadCrmConfig();
    assert.deepEqual(config.roles, ['Client', 'Prospect', 'Partner']);
    assert.equal(config.reminders.checkIntervalMs, 60000);
    assert.deepEqual(config.reminders.leadHours, { high: 48, medium: 24, low: 12 });
    assert.equal(config.sampleData, true);
    assert.equal(loadCrmConfig(), config);
  });

  test('rejects an empty role list', () => {
    assert.throws(
      () => parseCrmConfig({ ...validConfig(), roles: [] }),
      /^Error: Invalid CRM configuration: roles: /
    );
  });

  test('rejects a missing reminders block', () => {
    const { reminders: _omitted, ...rest } = validConfig();
    assert.throws(() => parseCrmConfig(rest), {
      message: 'Invalid CRM configuration: reminders: Required'
    });
  });

  test('rejects a non-positive check interval', () => {
    const config = validConfig();
    config.reminders.checkIntervalMs = 0;
    assert.throws(() => parseCrmConfig(config), /reminders\.checkIntervalMs/);
  });

  test('settings copy the lead hours', () => {
    const config = parseCrmConfig(validConfig());
    const settings = settingsFromConfig(config);
    settings.reminderLeadHours.high = 99;
    assert.equal(config.reminders.leadHours.high, 8);
    assert.equal(settings.notificationsEnabled, true);
  });
});

describe('sample data', () => {
  test('bundled seed has two customers', () => {
    const seed = loadSampleSeed();
    assert.deepEqual(
      seed.customers.map((customer) => customer.name),
      ['John Smith', 'Jane Doe']
    );
  });

  test('fills defaults', () => {
    const seed = parseSampleSeed({
      version: 1,
      customers: [
        {
          name: 'Mina Okafor',
          email: 'mina@example.test',
          tasks: [{ description: 'Intro call', dueInDays: 2 }]
        }
      ]
    });
    const [customer] = seed.customers;
    assert.equal(customer.phone, '');
    assert.deepEqual(customer.communications, []);
    assert.equal(customer.tasks[0].priority, 'medium');
  });

  test('reports the path of an invalid entry', () => {
    assert.throws(
      () =>
        parseSampleSeed({
          version: 1,
          customers: [
            {
              name: 'Mina Okafor',
              email: 'mina@example.test',
              tasks: [{ description: 'Intro call', dueInDays: 2, priority: 'urgent' }]
            }
          ]
        }),
      /^Error: Invalid sample data: customers\.0\.tasks\.0\.priority: /
    );
  });
});
