export { createProgram, main, run, CLI_NAME, EXIT_CODES } from './cli.js';
export { setupGlobalOptions, type CommandContext, type GlobalOptions } from './commands/context.js';
export * from './errors.js';
export { formatCliError, formatFileList } from './formatter.js';
export { TarArchiveBuilder, ARCHIVE_FILE_NAME } from './services/archive.js';
export { authorizeOptionsFromEnv, createAuthorize, type AuthorizeOptions } from './services/authorize.js';
export { createDefaultDependencies } from './services/defaults.js';
export { DefaultFileSelector, RESERVED_PACKAGES_NAME } from './services/file-selector.js';
export {
  AUTH_EXPIRED_NOTICE,
  DefaultPublishService,
  publishWithAuthRetry,
  runPublishAttempt,
  type PublishServiceOptions,
} from './services/publish.js';
export * from './services/response-parser.js';
export { UploadOrchestrator, NEW_UPLOAD_PATH } from './services/upload.js';
export type * from './types.js';
export { loadConfig, type PkgpostConfig, type ResolvedConfig } from './utils/config.js';
export { createLogger, logger, type Logger, type LoggerOptions } from './utils/logger.js';
