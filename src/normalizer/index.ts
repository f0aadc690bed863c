/**
 * Normalizer module
 *
 * Turns raw version strings into canonical wildcard/short/long forms.
 */

export { normalizeVersion, isValidVersionString, fixLeadingDot, type NormalizedVersion } from "./normalizer";
