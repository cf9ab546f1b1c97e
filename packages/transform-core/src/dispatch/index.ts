export { PlatformDispatcher } from './platform-dispatcher.js';
export type { JobTypeRef, TransformerRegistration } from './platform-dispatcher.js';
export { DispatcherRegistry, createDefaultRegistry } from './registry.js';
export type { DispatcherFactory, PlatformPair } from './registry.js';
export { DIALPAD_TO_ZOOM, RINGCENTRAL_TO_ZOOM, SSOT_TO_ZOOM } from './job-types.js';
