/**
 * Shared library plugin: Discord lookups, themed components and the
 * error/result/lock/file helpers every other plugin builds on.
 */

import type { ButtonInteraction } from "discord.js";
import type { PluginContext, PluginAPI, PluginLogger } from "../../src/types/Plugin.js";
import type { ComponentCallbackService } from "../../src/core/services/ComponentCallbackService.js";
import { ThingGetter } from "./utils/ThingGetter.js";
import { RollcallEmbedBuilder } from "./utils/components/RollcallEmbedBuilder.js";
import { RollcallButtonBuilder } from "./utils/components/RollcallButtonBuilder.js";
import { tryCatch, type Result, type Success, type Failure } from "./utils/tryCatch.js";

export type { Result, Success, Failure };

export interface LibAPI extends PluginAPI {
  version: string;
  /** Cache-first Discord entity fetching */
  thingGetter: ThingGetter;
  componentCallbackService: ComponentCallbackService;
  createEmbedBuilder: () => RollcallEmbedBuilder;
  /** Button bound to an inline callback; ttl in seconds */
  createButtonBuilder: (callback: (interaction: ButtonInteraction) => Promise<void>, ttl?: number) => RollcallButtonBuilder;
  tryCatch: typeof tryCatch;
  builders: {
    RollcallEmbedBuilder: typeof RollcallEmbedBuilder;
    RollcallButtonBuilder: typeof RollcallButtonBuilder;
  };
}

export async function onLoad(context: PluginContext): Promise<LibAPI> {
  const { client, logger, componentCallbackService } = context;

  const thingGetter = new ThingGetter(client);
  RollcallButtonBuilder.setCallbackService(componentCallbackService);
  logger.info("Library plugin loaded");

  return {
    version: "1.0.0",
    thingGetter,
    componentCallbackService,
    createEmbedBuilder: () => new RollcallEmbedBuilder(),
    createButtonBuilder: (callback, ttl) => new RollcallButtonBuilder(callback, ttl),
    tryCatch,
    builders: { RollcallEmbedBuilder, RollcallButtonBuilder },
  };
}

export async function onDisable(logger: PluginLogger): Promise<void> {
  RollcallButtonBuilder.setCallbackService(null);
  logger.info("Plugin disabled");
}
