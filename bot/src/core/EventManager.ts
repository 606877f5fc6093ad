/**
 * EventManager - Collects events from plugins and attaches them to the client
 */

import type { ClientEvents } from "discord.js";
import type { RollcallClient } from "../types/Client";
import log from "../utils/logger";
import { captureException } from "../utils/sentry";

export interface PluginEvent<K extends keyof ClientEvents = keyof ClientEvents> {
  /** Discord.js event name */
  event: K;
  once?: boolean;
  /** Which plugin owns this event */
  pluginName: string;
  execute: (client: RollcallClient, ...args: ClientEvents[K]) => Promise<void>;
}

type Attached = { event: keyof ClientEvents; listener: (...args: ClientEvents[keyof ClientEvents]) => void };

export class EventManager {
  private events: PluginEvent[] = [];
  private attached: Attached[] = [];

  constructor(private readonly client: RollcallClient) {}

  registerEvent<K extends keyof ClientEvents>(event: PluginEvent<K>): void {
    // Handlers are stored untyped; attachEvents() only ever feeds each one the args of its own event
    this.events.push(event as unknown as PluginEvent);
    log.debug(`Registered event: ${String(event.event)} (plugin: ${event.pluginName})`);
  }

  attachEvents(): void {
    for (const event of this.events) {
      const listener = (...args: ClientEvents[keyof ClientEvents]) => {
        event.execute(this.client, ...args).catch((error: unknown) => {
          log.error(`Event handler error (${String(event.event)} from ${event.pluginName}):`, error);
          captureException(error, { context: "Event Handler", event: String(event.event), plugin: event.pluginName });
        });
      };

      if (event.once) {
        this.client.once(event.event, listener);
      } else {
        this.client.on(event.event, listener);
      }
      this.attached.push({ event: event.event, listener });
    }

    log.info(`Attached ${this.events.length} event handler(s)`);
  }

  detachEvents(): void {
    for (const { event, listener } of this.attached) {
      this.client.off(event, listener);
    }
    this.attached = [];
  }

  getStats(): { total: number; byPlugin: Record<string, number> } {
    const byPlugin: Record<string, number> = {};
    for (const event of this.events) {
      byPlugin[event.pluginName] = (byPlugin[event.pluginName] ?? 0) + 1;
    }
    return { total: this.events.length, byPlugin };
  }
}
