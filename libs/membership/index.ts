export type { MembershipSnapshot, RevokeOutcome } from './store.js';
export { MembershipStore } from './store.js';
