export type * from './types/contact.js';
export type * from './types/email.js';
export type * from './types/sync.js';
export type * from './types/api.js';
