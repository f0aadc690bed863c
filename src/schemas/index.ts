import { z } from "zod";
import { isValidVersionString } from "#/normalizer";
import { GameVersion, safeParseVersion } from "#/version";

// Version string validation schema
export const VersionStringSchema = z.string().refine(isValidVersionString, {
  message: 'Invalid game version. Must be major.minor, major.minor.patch or "any" (e.g., 1.2, 0.25.2)',
});

// Short versions only (x.y), e.g. for filters that name a release family
export const ShortVersionStringSchema = VersionStringSchema.refine(
  (value) => {
    const result = safeParseVersion(value);
    return result.success && result.data.isShort();
  },
  { message: "Expected a short game version (major.minor)" }
);

// Long versions only (x.y.z...), e.g. for concrete releases
export const LongVersionStringSchema = VersionStringSchema.refine(
  (value) => {
    const result = safeParseVersion(value);
    return result.success && result.data.isLong();
  },
  { message: "Expected a long game version (major.minor.patch)" }
);

// Serialized game version: the canonical string, or null/"any" for the wildcard.
// Pairs with GameVersion#toJSON for a stable round trip.
export const GameVersionSchema = VersionStringSchema.nullable().transform((value) =>
  GameVersion.parse(value)
);
export type SerializedGameVersion = z.input<typeof GameVersionSchema>;

// A release that can be matched by targets(): always long
export const ReleaseVersionSchema = LongVersionStringSchema.transform((value) =>
  GameVersion.parse(value)
);
