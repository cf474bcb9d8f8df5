/**
 * Public API of the file organizer
 */

export { ActionJournal } from './action-journal.js';
export type { ActionJournalOptions } from './action-journal.js';
export { processBatch, summarizeBatch } from './batch-processor.js';
export type { BatchReport, ProcessingResult } from './batch-processor.js';
export { Categorizer, TEXT_EXTENSIONS } from './categorizer.js';
export type { CategorizerConfig } from './categorizer.js';
export {
  ConfigManager,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  applyEnvironment,
  mergeConfig,
  resolveConfigPath,
} from './config.js';
export type { OrganizerConfig } from './config.js';
export { HASH_BLOCK_SIZE, hashFile } from './content-hasher.js';
export type { ContentHasher } from './content-hasher.js';
export { IN_MEMORY, openDatabase } from './database.js';
export type { OrganizerDatabase } from './database.js';
export { DuplicateIndex } from './duplicate-index.js';
export * from './errors.js';
export { FileIndex } from './file-index.js';
export { FileManager, TEMP_MARKERS, isTempFile, parseDimension, parseReportFormat } from './file-manager.js';
export type { FileManagerOptions, ReportOptions } from './file-manager.js';
export { FileWalk, walkFiles } from './file-walker.js';
export type { DirectoryWalker } from './file-walker.js';
export { Logger, logger } from './logger.js';
export type { LogLevel, LogEntry } from './logger.js';
export { mimeToType, sniffBuffer, sniffMimeType } from './mime-sniffer.js';
export { collectStats, formatSize, humanReadableSize, renderJson, renderText } from './report.js';
export { moveSafely, pathExists, resolveAvailablePath, restoreExact } from './safe-mover.js';
export { UndoEngine } from './undo-engine.js';
export type { UndoEngineOptions } from './undo-engine.js';
export * from './types.js';
