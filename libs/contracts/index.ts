export * from './outcome.js';
export type { ClientFault } from './clientFault.js';
export type { KeyResolver } from './keyResolver.js';
export type { AuthResolver } from './authResolver.js';
export type { ConnectOptions, PolicyConnector, PolicyConnection } from './policyConnector.js';
