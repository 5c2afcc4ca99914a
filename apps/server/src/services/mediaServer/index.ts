/**
 * Media Server Client Module
 *
 * @example
 * import { createEmbyClient } from './services/mediaServer/index.js';
 *
 * const client = createEmbyClient({
 *   host: 'emby.local',
 *   port: 8096,
 *   useSsl: false,
 *   apiKey: 'test-api-key',
 * });
 *
 * const sessions = await client.getSessions();
 */

import { EmbyClient } from './emby/client.js';
import type { EmbyFetcher, EmbyServerConfig } from './types.js';

export function createEmbyClient(config: EmbyServerConfig): EmbyFetcher {
  return new EmbyClient(config);
}

export { EmbyClient, buildBaseUrl } from './emby/client.js';
export type * from './types.js';
