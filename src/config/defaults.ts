/**
 * Logger configuration defaults.
 *
 * These values can be overridden when creating a logger.
 */

/** Records buffered before an automatic flush. 0 disables automatic flushing. */
export const DEFAULT_FLUSH_INTERVAL = 1000

/** Maximum number of application frames captured per record */
export const DEFAULT_TRACE_LEVEL = 10

/** Category used when a record is logged without one */
export const DEFAULT_CATEGORY = 'application'

/** Categories summed by `Logger.getDbProfiling()` */
export const DEFAULT_DB_CATEGORIES: readonly string[] = ['db.query', 'db.execute']

/** Records a target collects before exporting them */
export const DEFAULT_EXPORT_INTERVAL = 1000

/** Root LogTape category for the library's own diagnostics */
export const DIAGNOSTICS_CATEGORY = 'spanlog'

/** Maximum log file size before rotation (1 MiB) */
export const DEFAULT_MAX_SIZE: number = 0x400 * 0x400

/** Number of rotated files to keep */
export const DEFAULT_MAX_FILES = 5

/** Log file extension written by the file target */
export const DEFAULT_LOG_EXTENSION = '.jsonl'

/** Root LogTape category the LogTape target logs under */
export const DEFAULT_ROOT_CATEGORY = 'app'
