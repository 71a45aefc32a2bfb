export {
  discoverFiles,
  extensionsToPattern,
  syncEntrants,
  filterExisting,
  displayName,
  EXCLUDED_FILES,
  MATCH_ALL,
} from './discovery';
export {
  trashFile,
  renameEntrantFile,
  planWildcardRename,
  resolveOpener,
  openFiles,
  fileTimestamp,
  TRASH_DIR,
} from './operations';
export type { OpenerCommand } from './operations';
