export { switchLights } from './light-switch';
export type { CommandSink } from './types';
