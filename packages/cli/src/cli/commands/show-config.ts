/**
 * solbench show-config command
 */

import { renderConfig } from '../config/config-manager.js';
import type { RuntimeConfig } from '../config/types.js';

export function showConfigCommand(config: RuntimeConfig, options: { secrets?: boolean } = {}): void {
  process.stdout.write(renderConfig(config, options.secrets ?? false));
}
