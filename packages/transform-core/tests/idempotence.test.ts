import { describe, expect, it } from 'vitest';
import type { DataRecord, TransformationSettings } from '@callbridge/core';
import {
  DIALPAD_TO_ZOOM,
  RINGCENTRAL_TO_ZOOM,
  SSOT_TO_ZOOM,
  createDefaultRegistry,
} from '../src/dispatch/index.js';
import type { DispatcherRegistry } from '../src/dispatch/index.js';
import { deterministicExtension } from '../src/rules/index.js';
import { makeDeps, mapping } from './helpers.js';

interface Case {
  source: string;
  code: string;
  input: DataRecord;
}

const weekdayHours = [{ schedule: { weeklyRanges: { monday: [{ from: '09:00', to: '17:00' }] } } }];

const CASES: Case[] = [
  {
    source: 'ringcentral',
    code: 'rc_zoom_sites',
    input: {
      id: 's1',
      name: 'Main Office',
      businessAddress: { street: '123 main st', city: 'austin', state: 'TX', zip: '73301', country: 'United States' },
    },
  },
  {
    source: 'ringcentral',
    code: 'rc_zoom_users',
    input: {
      id: 'u1',
      type: 'User',
      extensionNumber: '5',
      contact: { firstName: 'Ada', lastName: 'Lovelace', email: 'ada@example.test', businessPhone: '+15550100' },
      regionalSettings: { timezone: { id: '59' } },
    },
  },
  {
    source: 'ringcentral',
    code: 'rc_zoom_call_queues',
    input: { id: 'q1', name: 'Support', business_hours: weekdayHours },
  },
  {
    source: 'ringcentral',
    code: 'rc_zoom_ars',
    input: { id: 'a1', name: 'Main', site: { id: 's1' } },
  },
  {
    source: 'ringcentral',
    code: 'rc_zoom_ivr',
    input: {
      id: 'm1',
      name: 'Main IVR',
      ivr_details: [
        {
          actions: [
            { input: '1', action: 'Connect', extension: { id: '100', name: 'Sales Queue' } },
            { input: 'Hash', action: 'Disconnect' },
          ],
        },
      ],
    },
  },
  {
    source: 'ssot',
    code: 'ssot_to_zoom_sites',
    input: {
      id: 's9',
      name: 'Lab',
      businessAddress: { street: '1 Elm', city: 'Toronto', state: 'ON', zip: 'M5V', country: 'Canada' },
    },
  },
  {
    source: 'ssot',
    code: 'ssot_to_zoom_users',
    input: {
      id: 'u2',
      email: 'li@example.test',
      given_name: 'Li',
      lastName: 'Wei',
      user_type: 'DigitalUser',
      timezone: 'Pacific Time',
      phone_numbers: [{ number: '+15550104', type: 'mobile' }],
      extensionNumber: '7',
    },
  },
  {
    source: 'ssot',
    code: 'ssot_to_zoom_call_queues',
    input: { id: 'q2', name: 'Help', business_hours: weekdayHours },
  },
  {
    source: 'ssot',
    code: 'ssot_to_zoom_auto_receptionists',
    input: {
      aa_name: 'Front Door',
      aa_site: 's1',
      schedule: { weeklyRanges: { monday: [{ from: '09:00', to: '17:00' }] } },
      greeting: { audio: { id: 'g1' }, mode: 'Audio' },
    },
  },
  {
    source: 'ssot',
    code: 'ssot_to_zoom_ivr',
    input: {
      name: 'Main',
      site: 's1',
      menu: [
        { key: 'Star', action: 'Repeat' },
        { key: '3', action: 'Voicemail', target: { extension_id: 'u3' } },
      ],
    },
  },
  {
    source: 'dialpad',
    code: 'dialpad_zoom_sites',
    input: {
      id: '5001',
      name: 'Austin Office',
      office_id: '77',
      timezone: 'US/Central',
      e911_address: { address: '500 elm st', city: 'Austin', state: 'TX', zip: '73301', country: 'us' },
    },
  },
  {
    source: 'dialpad',
    code: 'dialpad_zoom_users',
    input: {
      id: '123',
      first_name: 'Grace',
      last_name: 'Hopper',
      emails: ['grace@example.test'],
      extension: '204',
      group_details: [{ group_type: 'office', group_id: '42' }],
    },
  },
  {
    source: 'dialpad',
    code: 'dialpad_zoom_call_queues',
    input: { id: 'cc1', name: 'Support', office_id: '77', monday_hours: ['08:00', '18:00'] },
  },
  {
    source: 'dialpad',
    code: 'dialpad_zoom_ars',
    input: { id: '77', name: 'Austin' },
  },
  {
    source: 'dialpad',
    code: 'dialpad_zoom_ivr',
    input: {
      id: '77',
      name: 'Austin',
      routing_options: {
        open: { dtmf: [{ input: '1', options: { action: 'department', action_target_id: 'cc1' } }] },
      },
    },
  },
];

const CONFIGS: { [code: string]: TransformationSettings } = {
  rc_zoom_sites: { normalize_address: true },
  rc_zoom_users: { extension_format: { prefix: '10' } },
  ssot_to_zoom_users: { extension_format: { padding_char: '0', min_length: 4 } },
  dialpad_zoom_users: { extension_format: { prefix: '9' } },
};

const MAPPINGS = [
  mapping(39, 'user', 'given_name', 'user_info.first_name'),
  mapping(77, 'auto_receptionist', 'aa_name', 'name', { isRequired: true }),
  mapping(77, 'auto_receptionist', 'aa_site', 'auto_receptionist.site_id'),
  mapping(77, 'auto_receptionist', 'schedule', 'auto_receptionist.hours_of_operation'),
  mapping(77, 'auto_receptionist', 'greeting', 'auto_receptionist.prompt'),
  mapping(78, 'ivr', 'menu', 'ivr_setting.menu_options'),
  mapping(78, 'ivr', 'site', 'ivr_setting.site_id'),
];

function freshRegistry(): DispatcherRegistry {
  return createDefaultRegistry(makeDeps({ mappings: MAPPINGS, configs: CONFIGS }));
}

describe('registered transformers', () => {
  it('cover every registered job type', () => {
    const registered = [...RINGCENTRAL_TO_ZOOM, ...SSOT_TO_ZOOM, ...DIALPAD_TO_ZOOM].map((r) => r.code);
    expect(CASES.map((c) => c.code)).toEqual(registered);
  });

  for (const { source, code, input } of CASES) {
    it(`${code} produces identical output on every run`, async () => {
      const before = structuredClone(input);
      const first = freshRegistry();
      const second = freshRegistry();

      const once = await first.transformData(source, 'zoom', code, input);
      const again = await first.transformData(source, 'zoom', code, input);
      const elsewhere = await second.transformData(source, 'zoom', code, input);

      expect(again).toEqual(once);
      expect(elsewhere).toEqual(once);
      expect(JSON.stringify(again)).toBe(JSON.stringify(once));
      expect(JSON.stringify(elsewhere)).toBe(JSON.stringify(once));
      expect(input).toEqual(before);
    });
  }

  it('derive the same extensions and site codes in separate registries', async () => {
    const outputs = await Promise.all(
      [freshRegistry(), freshRegistry()].map(async (registry) => ({
        ar: await registry.transformData('dialpad', 'zoom', 'dialpad_zoom_ars', { id: '77', name: 'Austin' }),
        queue: await registry.transformData('dialpad', 'zoom', 'dialpad_zoom_call_queues', { id: 'cc1', name: 'Q' }),
        site: await registry.transformData('ringcentral', 'zoom', 'rc_zoom_sites', { id: 's1', name: 'Main Office' }),
      }))
    );

    for (const { ar, queue, site } of outputs) {
      expect(ar.extensionNumber).toBe(deterministicExtension('77', 'ar'));
      expect(queue.extensionNumber).toBe(deterministicExtension('cc1', 'cq'));
      expect(site.site_code).toBe('MAIN_OFFICE');
      expect(site.auto_receptionist_name).toBe('Main Office (NIU)');
    }
  });
});
