/**
 * DiscordOAuth - authorization-code flow against Discord (identify scope only)
 */

import { z } from "zod";
import { DiscordApiError } from "../../lib/utils/errors.js";

const DISCORD_API_BASE = "https://discord.com/api/v10";
const DISCORD_OAUTH_AUTHORIZE = "https://discord.com/oauth2/authorize";
const DISCORD_OAUTH_TOKEN = "https://discord.com/api/oauth2/token";

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
});

const DiscordUserSchema = z.object({
  id: z.string(),
  username: z.string(),
  global_name: z.string().nullish(),
});

export interface DiscordUser {
  id: string;
  username: string;
  globalName: string | null;
}

export interface DiscordOAuthOptions {
  clientId: string;
  clientSecret: string;
  /** Must match a redirect registered on the Discord application */
  redirectUri: string;
  fetchImpl?: typeof fetch;
}

export class DiscordOAuth {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: DiscordOAuthOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  authorizeUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.options.clientId,
      response_type: "code",
      redirect_uri: this.options.redirectUri,
      scope: "identify",
      state,
      prompt: "none",
    });
    return `${DISCORD_OAUTH_AUTHORIZE}?${params.toString()}`;
  }

  /**
   * Exchange a callback code and fetch the user it belongs to
   */
  async identify(code: string): Promise<DiscordUser> {
    const token = await this.exchangeCode(code);
    return this.fetchUser(token);
  }

  private async exchangeCode(code: string): Promise<string> {
    const body = new URLSearchParams({
      grant_type: "authorization_code",
      code,
      redirect_uri: this.options.redirectUri,
    });

    const response = await this.request(DISCORD_OAUTH_TOKEN, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Authorization: `Basic ${Buffer.from(`${this.options.clientId}:${this.options.clientSecret}`).toString("base64")}`,
      },
      body: body.toString(),
    });

    const parsed = TokenResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new DiscordApiError("Discord token response was missing an access token");
    }
    return parsed.data.access_token;
  }

  private async fetchUser(accessToken: string): Promise<DiscordUser> {
    const response = await this.request(`${DISCORD_API_BASE}/users/@me`, {
      headers: { Authorization: `Bearer ${accessToken}` },
    });

    const parsed = DiscordUserSchema.safeParse(response);
    if (!parsed.success) {
      throw new DiscordApiError("Discord returned an unexpected user payload");
    }
    return { id: parsed.data.id, username: parsed.data.username, globalName: parsed.data.global_name ?? null };
  }

  private async request(url: string, init: RequestInit): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, init);
    } catch (error) {
      throw new DiscordApiError("Failed to reach Discord", error);
    }

    if (!response.ok) {
      throw new DiscordApiError(`Discord OAuth request failed (${response.status})`);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new DiscordApiError("Discord returned invalid JSON", error);
    }
  }
}
