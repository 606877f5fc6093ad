/**
 * RollcallClient - discord.js client with the plugin registry attached
 */

import type { Client } from "discord.js";

export interface RollcallClient extends Client<true> {
  /**
   * Plugin APIs registered by loaded plugins
   * Access via: client.plugins.get("pluginName")
   */
  plugins: Map<string, unknown>;
}

/**
 * Attach the plugin registry to a ready client
 */
export function toRollcallClient(client: Client<true>, plugins: Map<string, unknown> = new Map()): RollcallClient {
  return Object.assign(client, { plugins });
}
