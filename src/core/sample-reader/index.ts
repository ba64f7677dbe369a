export { readSample } from './sample-reader';
export type { LineSource } from './types';
