import { logVerbose } from "../logger.js";
import { hasPermission } from "./permissions.js";
import type { CommandTier, Permission, Role } from "./types.js";

export type CommandGateResult =
  | { allowed: true; role: Role }
  | { allowed: false; role: Role; reason: CommandDenialReason };

export type CommandDenialReason = "requires owner" | "requires admin" | "public commands disabled";

const TIER_PERMISSION: Record<CommandTier, Permission> = {
  owner: "ownerCommands",
  admin: "adminCommands",
  public: "publicCommands",
};

const TIER_DENIAL: Record<CommandTier, CommandDenialReason> = {
  owner: "requires owner",
  admin: "requires admin",
  public: "public commands disabled",
};

/**
 * Gate a command of the given tier for an already-resolved role.
 *
 * Roles with `bypassAllChecks` pass every tier, including public commands
 * while they are switched off.
 */
export function gateCommand(params: {
  role: Role;
  tier: CommandTier;
  enablePublicCommands: boolean;
  senderId?: number;
}): CommandGateResult {
  const { role, tier, enablePublicCommands } = params;
  if (hasPermission(role, "bypassAllChecks")) {
    return { allowed: true, role };
  }
  const permitted =
    hasPermission(role, TIER_PERMISSION[tier]) && (tier !== "public" || enablePublicCommands);
  if (permitted) {
    return { allowed: true, role };
  }
  logVerbose(
    `Blocking ${tier} command from role="${role}" sender: ${params.senderId ?? "<unknown>"}`,
  );
  return { allowed: false, role, reason: TIER_DENIAL[tier] };
}
