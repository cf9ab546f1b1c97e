export { RingCentralSitesTransformer } from './sites.js';
export { RingCentralUsersTransformer } from './users.js';
export { RingCentralCallQueuesTransformer } from './call-queues.js';
export { RingCentralAutoReceptionistsTransformer } from './auto-receptionists.js';
export { RingCentralIvrTransformer } from './ivr.js';
export type { IvrAction } from './ivr.js';
