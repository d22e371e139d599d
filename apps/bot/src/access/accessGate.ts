import { ALLOW_ALL_USER_ID, AllowedUsersSchema, type AllowedUsers } from "@fleetfuel/core";

import { loadJsonConfig } from "../config/jsonFile.js";
import { AuthorizationError } from "../errors.js";

export type AccessGate = {
  isAuthorized(userId: number | string): boolean;
  /** Throws AuthorizationError for users outside the whitelist. */
  assertAuthorized(userId: number | string): void;
  displayName(userId: number | string): string | undefined;
};

export function createAccessGate(allowed: AllowedUsers): AccessGate {
  const names = new Map<string, string | undefined>();
  for (const u of allowed.users) names.set(String(u.telegramId), u.name);

  const openToAll = names.size === 0 || names.has(String(ALLOW_ALL_USER_ID));

  const isAuthorized = (userId: number | string) => openToAll || names.has(String(userId));

  return {
    isAuthorized,
    assertAuthorized(userId) {
      if (!isAuthorized(userId)) throw new AuthorizationError(String(userId));
    },
    displayName(userId) {
      return names.get(String(userId));
    },
  };
}

export async function loadAccessGate(path: string): Promise<AccessGate> {
  return createAccessGate(await loadJsonConfig(AllowedUsersSchema, path));
}
