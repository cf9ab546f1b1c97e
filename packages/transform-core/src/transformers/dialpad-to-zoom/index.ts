export { DialpadSitesTransformer } from './sites.js';
export { DialpadUsersTransformer } from './users.js';
export { DialpadCallQueuesTransformer } from './call-queues.js';
export { DialpadAutoReceptionistsTransformer } from './auto-receptionists.js';
export { DialpadIvrTransformer } from './ivr.js';
