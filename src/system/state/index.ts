export { createInitialState } from './state';
export type { RecorderState } from './types';
