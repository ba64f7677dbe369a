export { runCycle, runController } from './control';
export { waitForInput, collectMinute, processLights, processRecording } from './helpers';
export type { Controller } from './types';
