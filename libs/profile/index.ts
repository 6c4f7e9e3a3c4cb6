export type { ProfileState } from './switchController.js';
export { ProfileSwitchController } from './switchController.js';
