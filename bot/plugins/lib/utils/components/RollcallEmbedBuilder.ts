import { EmbedBuilder, type ColorResolvable } from "discord.js";

export const ROLLCALL_COLOR: ColorResolvable = 0x5865f2;

export const ROLLCALL_FOOTER = "Rollcall";

/**
 * Embed with the default theming: brand colour, timestamp and footer
 */
export class RollcallEmbedBuilder extends EmbedBuilder {
  constructor() {
    super();
    this.setColor(ROLLCALL_COLOR);
    this.setTimestamp();
    this.setFooter({ text: ROLLCALL_FOOTER });
  }

  static error(message: string): RollcallEmbedBuilder {
    return new RollcallEmbedBuilder().setColor(0xef4444).setDescription(`❌ ${message}`);
  }

  static success(message: string): RollcallEmbedBuilder {
    return new RollcallEmbedBuilder().setColor(0x22c55e).setDescription(`✅ ${message}`);
  }

  static warning(message: string): RollcallEmbedBuilder {
    return new RollcallEmbedBuilder().setColor(0xeab308).setDescription(`⚠️ ${message}`);
  }

  static info(message: string): RollcallEmbedBuilder {
    return new RollcallEmbedBuilder().setColor(0x3b82f6).setDescription(`ℹ️ ${message}`);
  }
}
