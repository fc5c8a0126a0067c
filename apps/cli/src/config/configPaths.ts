import { homedir } from 'node:os';
import { join } from 'node:path';

export function resolveConfigFilePath(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  if (env.ESTATE_LENS_CONFIG_PATH) {
    return env.ESTATE_LENS_CONFIG_PATH;
  }

  if (platform === 'win32') {
    const base = env.APPDATA ?? join(homedir(), 'AppData', 'Roaming');
    return join(base, 'EstateLens', 'config.json');
  }

  const base = env.XDG_CONFIG_HOME ?? join(homedir(), '.config');
  return join(base, 'estate-lens', 'config.json');
}
