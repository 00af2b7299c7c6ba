export {
  type Criteria,
  ObjectStore,
  type ObjectStoreOptions,
  type StoredRecord,
} from "./src/ObjectStore.ts";
export {
  criteriaMatches,
  isRegexPattern,
  toRegExp,
} from "./src/CriteriaMatcher.ts";
export {
  createStoreFilename,
  ScratchFile,
  type StoreFilenameOptions,
} from "./src/ScratchFile.ts";
export {
  DEFAULT_STORE_VARIABLE,
  EnvStoreLocator,
  FileStoreLocator,
  type StoreLocator,
} from "./src/StoreLocator.ts";
export {
  type Configuration,
  loadConfiguration,
  type LogLevelName,
  logLevels,
} from "./src/Configuration.ts";
export {
  createLogger,
  Logger,
  LogLevel,
  type LoggerOptions,
} from "./src/Logger.ts";
export { MockStoreError, type MockStoreErrorCode } from "./src/MockStoreError.ts";
export * from "./src/mocks/mod.ts";
