export { computeLightWindow, decideLightState, controlLights, checkSite } from './light-schedule';
export { parseManualTime, parseStableDate, isValidZone, getSunTimes, onDay } from './helpers';
export type { LightWindow, LightControlContext, ClockTime, SunTimes } from './types';
