import type { OriginKey } from "../origin/originKey.js";

export type PermanentPermissionsState = {
  origins: Record<OriginKey, boolean>;
};

export type PermissionDecision = {
  origin: OriginKey;
  allow: boolean;
  remember: boolean;
};

export type PermanentPermissionsChange =
  | { type: "recorded"; origin: OriginKey; allow: boolean }
  | { type: "cleared"; origin: OriginKey }
  | { type: "clearedAll"; origins: OriginKey[] }
  | { type: "replaced" };
