export const GeogateReasons = {
  OriginInvalid: "origin/invalid",

  PermissionMissingPermanentDecision: "permission/missing_permanent_decision",

  StorageInvalidSnapshot: "storage/invalid_snapshot",

  RuntimeDestroyed: "runtime/destroyed",
  RuntimeDuplicateTab: "runtime/duplicate_tab",
} as const;

export type GeogateReason = (typeof GeogateReasons)[keyof typeof GeogateReasons];

/**
 * Context attached to each failure, keyed by reason.
 */
export type GeogateErrorData = {
  "origin/invalid": { input: string };
  "permission/missing_permanent_decision": { tabId: string; origin: string };
  "storage/invalid_snapshot": { issues: string[] };
  "runtime/destroyed": { tabId: string | null };
  "runtime/duplicate_tab": { tabId: string };
};
