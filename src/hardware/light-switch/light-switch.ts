/**
 * Light switch control
 * Sends ON/OFF commands to the device over the shared serial line
 */

import { APP_CONSTANTS } from '@boot/config';
import type { CommandSink } from './types';

/**
 * Command the lights ON or OFF
 *
 * @param device - Command sink (serial transport)
 * @param state - Desired state
 * @returns Resolves once the command is written; rejects on write failure
 */
export function switchLights(device: CommandSink, state: 'on' | 'off'): Promise<void> {
  return device.write(state === 'on' ? APP_CONSTANTS.LIGHT_ON_COMMAND : APP_CONSTANTS.LIGHT_OFF_COMMAND);
}
