/**
 * Load configuration, initialize and run the recorder
 */

import { loadConfig } from './config';
import { initialize } from './init';
import { runController } from '@system/control';
import { describeError } from '$types/errors';

import type { MonitorConfig } from '$types/config';
import type { StartDependencies } from './types';

/**
 * Run the recorder to completion
 *
 * @param configPath - JSON config file
 * @param env - Environment overrides
 * @param deps - Optional stand-ins, see initialize()
 * @returns Process exit code
 */
export async function start(
  configPath: string,
  env: NodeJS.ProcessEnv,
  deps: StartDependencies = {}
): Promise<number> {
  let config: MonitorConfig;
  try {
    config = await loadConfig(configPath, env);
  } catch (err) {
    console.error('INIT FAIL: ' + describeError(err));
    return 1;
  }

  const result = await initialize(config, deps);
  if (result === null) {
    return 1;
  }

  const { controller, flushLogs } = result;
  try {
    await runController(controller, deps.keepRunning);
    return 0;
  } catch (err) {
    controller.logger.critical('Recorder stopped: ' + describeError(err));
    return 1;
  } finally {
    if (controller.transport.isConnected()) {
      await controller.transport.close().catch(function(err: unknown) {
        controller.logger.warning('Failed closing ' + controller.transport.path + ': ' + describeError(err));
      });
    }
    flushLogs();
  }
}
