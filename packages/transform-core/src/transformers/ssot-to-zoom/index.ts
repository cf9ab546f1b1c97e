export { SsotSitesTransformer } from './sites.js';
export { SsotUsersTransformer } from './users.js';
export { SsotCallQueuesTransformer } from './call-queues.js';
export { SsotAutoReceptionistsTransformer } from './auto-receptionists.js';
export { SsotIvrTransformer, processMenuOption } from './ivr.js';
