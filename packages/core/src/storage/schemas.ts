import { z } from "zod";
import { PermanentPermissionsStateSchema } from "../permissions/topics.js";

export const PERMANENT_PERMISSIONS_SNAPSHOT_VERSION = 1 as const;

const epochMillisecondsSchema = z.number().int().nonnegative();

export const createSnapshotSchema = <TPayload extends z.ZodType, const TVersion extends number>(config: {
  version: TVersion;
  payload: TPayload;
}) =>
  z.strictObject({
    version: z.literal(config.version),
    updatedAt: epochMillisecondsSchema,
    payload: config.payload,
  });

export const PermanentPermissionsSnapshotSchema = createSnapshotSchema({
  version: PERMANENT_PERMISSIONS_SNAPSHOT_VERSION,
  payload: PermanentPermissionsStateSchema,
});

export type PermanentPermissionsSnapshot = z.infer<typeof PermanentPermissionsSnapshotSchema>;
