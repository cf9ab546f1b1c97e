/**
 * Registration tables, one per shipped platform pair
 *
 * Explicit lists rather than discovery: every transformer the engine can run
 * is named here.
 */

import {
  DialpadAutoReceptionistsTransformer,
  DialpadCallQueuesTransformer,
  DialpadIvrTransformer,
  DialpadSitesTransformer,
  DialpadUsersTransformer,
} from '../transformers/dialpad-to-zoom/index.js';
import {
  RingCentralAutoReceptionistsTransformer,
  RingCentralCallQueuesTransformer,
  RingCentralIvrTransformer,
  RingCentralSitesTransformer,
  RingCentralUsersTransformer,
} from '../transformers/ringcentral-to-zoom/index.js';
import {
  SsotAutoReceptionistsTransformer,
  SsotCallQueuesTransformer,
  SsotIvrTransformer,
  SsotSitesTransformer,
  SsotUsersTransformer,
} from '../transformers/ssot-to-zoom/index.js';
import type { TransformerRegistration } from './platform-dispatcher.js';

export const RINGCENTRAL_TO_ZOOM: readonly TransformerRegistration[] = [
  {
    code: 'rc_zoom_sites',
    id: 33,
    name: 'RingCentral Sites to Zoom Sites',
    entity: 'site',
    create: (deps) => new RingCentralSitesTransformer(deps),
  },
  {
    code: 'rc_zoom_users',
    id: 39,
    name: 'RingCentral Users to Zoom Users',
    entity: 'user',
    create: (deps) => new RingCentralUsersTransformer(deps),
    dependencies: ['rc_zoom_sites'],
  },
  {
    code: 'rc_zoom_call_queues',
    id: 45,
    name: 'RingCentral Call Queues to Zoom Call Queues',
    entity: 'call_queue',
    create: (deps) => new RingCentralCallQueuesTransformer(deps),
    dependencies: ['rc_zoom_sites', 'rc_zoom_users'],
  },
  {
    code: 'rc_zoom_ars',
    id: 77,
    name: 'RingCentral Auto Receptionists to Zoom Auto Receptionists',
    entity: 'auto_receptionist',
    create: (deps) => new RingCentralAutoReceptionistsTransformer(deps),
    dependencies: ['rc_zoom_sites'],
  },
  {
    code: 'rc_zoom_ivr',
    id: 78,
    name: 'RingCentral IVR to Zoom IVR',
    entity: 'ivr',
    create: (deps) => new RingCentralIvrTransformer(deps),
    dependencies: ['rc_zoom_ars', 'rc_zoom_call_queues', 'rc_zoom_users'],
  },
];

export const SSOT_TO_ZOOM: readonly TransformerRegistration[] = [
  {
    code: 'ssot_to_zoom_sites',
    id: 33,
    name: 'SSOT Sites to Zoom Sites',
    entity: 'site',
    create: (deps) => new SsotSitesTransformer(deps),
  },
  {
    code: 'ssot_to_zoom_users',
    id: 39,
    name: 'SSOT Users to Zoom Users',
    entity: 'user',
    create: (deps) => new SsotUsersTransformer(deps),
    dependencies: ['ssot_to_zoom_sites'],
  },
  {
    code: 'ssot_to_zoom_call_queues',
    id: 45,
    name: 'SSOT Call Queues to Zoom Call Queues',
    entity: 'call_queue',
    create: (deps) => new SsotCallQueuesTransformer(deps),
    dependencies: ['ssot_to_zoom_sites', 'ssot_to_zoom_users'],
  },
  {
    code: 'ssot_to_zoom_auto_receptionists',
    id: 77,
    name: 'SSOT Auto Attendants to Zoom Auto Receptionists',
    entity: 'auto_receptionist',
    create: (deps) => new SsotAutoReceptionistsTransformer(deps),
    dependencies: ['ssot_to_zoom_sites'],
  },
  {
    code: 'ssot_to_zoom_ivr',
    id: 78,
    name: 'SSOT IVR to Zoom IVR',
    entity: 'ivr',
    create: (deps) => new SsotIvrTransformer(deps),
    dependencies: ['ssot_to_zoom_auto_receptionists', 'ssot_to_zoom_call_queues', 'ssot_to_zoom_users'],
  },
];

export const DIALPAD_TO_ZOOM: readonly TransformerRegistration[] = [
  {
    code: 'dialpad_zoom_sites',
    id: 33,
    name: 'Dialpad Offices to Zoom Sites',
    entity: 'site',
    create: (deps) => new DialpadSitesTransformer(deps),
  },
  {
    code: 'dialpad_zoom_users',
    id: 39,
    name: 'Dialpad Users to Zoom Users',
    entity: 'user',
    create: (deps) => new DialpadUsersTransformer(deps),
    dependencies: ['dialpad_zoom_sites'],
  },
  {
    code: 'dialpad_zoom_call_queues',
    id: 45,
    name: 'Dialpad Call Centers to Zoom Call Queues',
    entity: 'call_queue',
    create: (deps) => new DialpadCallQueuesTransformer(deps),
    dependencies: ['dialpad_zoom_sites', 'dialpad_zoom_users'],
  },
  {
    code: 'dialpad_zoom_ars',
    id: 77,
    name: 'Dialpad Offices to Zoom Auto Receptionists',
    entity: 'auto_receptionist',
    create: (deps) => new DialpadAutoReceptionistsTransformer(deps),
    dependencies: ['dialpad_zoom_sites'],
  },
  {
    code: 'dialpad_zoom_ivr',
    id: 78,
    name: 'Dialpad Routing Options to Zoom IVR',
    entity: 'ivr',
    create: (deps) => new DialpadIvrTransformer(deps),
    dependencies: ['dialpad_zoom_ars', 'dialpad_zoom_call_queues', 'dialpad_zoom_users'],
  },
];
