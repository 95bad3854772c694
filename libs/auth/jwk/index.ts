export * from './errors.js';
export { KidResolver } from './kidResolver.js';
export type { JwkEntry, JwkSet } from './kidResolver.js';
export { JwkAuthResolver, extractBearer } from './jwkAuthResolver.js';
