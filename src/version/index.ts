/**
 * Version module
 *
 * Game version value, ordering and compatibility targeting.
 */

export { GameVersion, parseVersion, safeParseVersion, safeCompareVersions } from "./version";
export {
  compareVersions,
  compareComponents,
  sortVersionsDesc,
  getHighestVersion,
} from "./comparator";
export { targets, filterTargeting } from "./targets";
