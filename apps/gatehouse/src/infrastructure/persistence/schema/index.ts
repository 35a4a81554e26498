export * from './identities.js';
export * from './authorizations.js';
