/**
 * Global constants for game version handling
 */

// Literal token for the wildcard version. Also what a wildcard renders as.
export const ANY_VERSION = "any";

// Patch numbers appended when widening a short version (x.y) into a long one.
// 99 is a convention for "any patch the short form could mean", not a real upper bound.
export const LONG_MIN_PATCH = 0;
export const LONG_MAX_PATCH = 99;

// Short: exactly major.minor
export const SHORT_VERSION_REGEX = /^\d+\.\d+$/;

// Long: major.minor.patch, optionally followed by more numeric components
export const LONG_VERSION_REGEX = /^\d+(?:\.\d+){2,}$/;
