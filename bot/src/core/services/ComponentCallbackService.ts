/**
 * ComponentCallbackService - Inline callbacks for buttons and select menus
 *
 * A component gets a random customId bound to a callback in memory. The
 * binding expires after its TTL; clicking an expired component gets a
 * polite "expired" reply instead of silence.
 */

import type { ButtonInteraction, AnySelectMenuInteraction } from "discord.js";
import { customAlphabet } from "nanoid";
import log from "../../utils/logger";

export type ComponentInteraction = ButtonInteraction | AnySelectMenuInteraction;
export type ComponentCallback = (interaction: ComponentInteraction) => Promise<void>;

interface StoredCallback {
  callback: ComponentCallback;
  expiresAt: number;
  timer: NodeJS.Timeout;
}

export interface ComponentStats {
  callbacks: number;
}

// Discord customIds are opaque but keep them URL-safe and readable in logs
const ID_ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";

export class ComponentCallbackService {
  private callbacks = new Map<string, StoredCallback>();
  private readonly generateId: () => string;

  constructor(nanoidLength: number = 12) {
    this.generateId = customAlphabet(ID_ALPHABET, nanoidLength);
  }

  /**
   * Bind a callback to a fresh customId
   * @param ttl - Lifetime in seconds
   * @returns The customId to put on the component
   */
  register(callback: ComponentCallback, ttl: number = 300): string {
    const customId = this.generateId();
    const timer = setTimeout(() => {
      this.callbacks.delete(customId);
    }, ttl * 1000);
    timer.unref();

    this.callbacks.set(customId, { callback, expiresAt: Date.now() + ttl * 1000, timer });
    log.debug(`[ComponentCallbackService] Registered component ${customId} (TTL: ${ttl}s)`);

    return customId;
  }

  /**
   * Route a component interaction to its callback
   * @returns true if a live callback handled it
   */
  async execute(interaction: ComponentInteraction): Promise<boolean> {
    const { customId } = interaction;
    const stored = this.callbacks.get(customId);

    if (!stored || stored.expiresAt <= Date.now()) {
      log.debug(`[ComponentCallbackService] Expired or unknown component: ${customId} (user: ${interaction.user.id})`);
      if (!interaction.replied && !interaction.deferred) {
        await interaction.reply({ content: "⏳ This button or menu has expired. Please try again.", ephemeral: true }).catch((error: unknown) => {
          log.debug("[ComponentCallbackService] Could not send expiry notice:", error);
        });
      }
      return false;
    }

    const startTime = Date.now();
    try {
      await stored.callback(interaction);
      log.debug(`[ComponentCallbackService] ✅ ${customId} completed in ${Date.now() - startTime}ms`);
    } catch (error) {
      log.error(`[ComponentCallbackService] ❌ ${customId} failed (user: ${interaction.user.id}):`, error);
      if (!interaction.replied && !interaction.deferred) {
        await interaction.reply({ content: "❌ An error occurred while processing this interaction.", ephemeral: true }).catch((replyError: unknown) => {
          log.debug("[ComponentCallbackService] Could not send error notice:", replyError);
        });
      }
    }
    return true;
  }

  unregister(customId: string): void {
    const stored = this.callbacks.get(customId);
    if (!stored) return;
    clearTimeout(stored.timer);
    this.callbacks.delete(customId);
  }

  /**
   * Drop every binding (shutdown)
   */
  clear(): void {
    for (const stored of this.callbacks.values()) {
      clearTimeout(stored.timer);
    }
    this.callbacks.clear();
  }

  getStats(): ComponentStats {
    return { callbacks: this.callbacks.size };
  }
}
