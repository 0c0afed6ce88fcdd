export { isCommandAllowed, requireAllowedCommand } from "./CommandValidator";
export { isAllowedService, requireAllowedService, requireRepoPath } from "./NameValidator";
export type { PathCheck, PathRules } from "./PathValidator";
export { canonicalizePath, checkPath, isBlockedPath, isWithin, requireAllowedPath } from "./PathValidator";
export { findWriteKeyword, isReadOnlyQuery, requireReadOnlyQuery, WRITE_KEYWORDS, WRITE_QUERY_MESSAGE } from "./QueryValidator";
