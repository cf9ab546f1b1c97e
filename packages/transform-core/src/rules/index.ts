export * from './country.js';
export * from './address.js';
export * from './timezone.js';
export * from './user-type.js';
export * from './ivr.js';
export * from './schedule.js';
export * from './extension.js';
export * from './site.js';
export * from './user.js';
export * from './prompt.js';
export * from './dtmf.js';
