/**
 * LINE channel configuration, read from the environment.
 */

import { isTruthy, type Env } from "@daybrief/core";

export type LineRoute = "push" | "broadcast";

export interface LineConfig {
  /** Channel access token; absent means dry-run */
  accessToken?: string;
  /** Recipient ID for the push route */
  to?: string;
  route: LineRoute;
}

function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadLineConfig(env: Env = process.env): LineConfig {
  return {
    accessToken: present(env.LINE_CHANNEL_ACCESS_TOKEN),
    to: present(env.LINE_TO),
    route: isTruthy(env.USE_BROADCAST) ? "broadcast" : "push",
  };
}

/**
 * Name of the setting that keeps `config` from sending for real,
 * or null when it is complete.
 */
export function missingCredential(config: LineConfig): string | null {
  if (!config.accessToken) return "LINE_CHANNEL_ACCESS_TOKEN";
  if (config.route === "push" && !config.to) return "LINE_TO";
  return null;
}
