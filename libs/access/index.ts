export type { AccessCore } from './accessService.js';
export { AccessService, createAccessCore } from './accessService.js';
