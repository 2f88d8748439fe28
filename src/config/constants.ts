/**
 * Constants for geokv-bench
 *
 * Named defaults for the store connection, writers and readers. Config
 * schemas in types.ts pick these up as their default values.
 */

// ============================================================================
// Store Constants
// ============================================================================

export const DEFAULT_STORE_HOST = "localhost";

export const DEFAULT_STORE_PORT = 6379;

/**
 * Connect timeout for the store client. ioredis applies it per connection
 * attempt.
 */
export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

/**
 * Per-command timeout. 0 leaves commands without a client-side timeout.
 */
export const DEFAULT_COMMAND_TIMEOUT_MS = 30000;

/**
 * Fixed first segment of every record key: `<prefix>:<version>:<id>`.
 */
export const DEFAULT_KEY_PREFIX = "ip";

// ============================================================================
// Writer Constants
// ============================================================================

export const DEFAULT_WRITER_COUNT = 4;

/**
 * Number of SET commands sent in one pipelined round trip.
 */
export const DEFAULT_WRITER_BATCH_SIZE = 50;

/**
 * Number of ids a continuous writer attempts per loop iteration. Each
 * iteration is split into pipelined batches of DEFAULT_WRITER_BATCH_SIZE.
 */
export const DEFAULT_WRITE_CHUNK = 100;

/**
 * 3 days = 3 * 24 * 60 * 60.
 */
export const DEFAULT_KEY_TTL_SECONDS = 259200;

/**
 * Default size of the per-version key-space.
 */
export const DEFAULT_MAX_KEYS = 200000;

export const MAX_WORKERS = 256;

/**
 * Pause between versions in a multi-version import.
 */
export const DEFAULT_VERSION_PAUSE_MS = 2000;

// ============================================================================
// Reader Constants
// ============================================================================

export const DEFAULT_READER_COUNT = 4;

/**
 * Ids per pipelined read batch. Each id costs two GETs in the pipeline.
 */
export const DEFAULT_READER_BATCH_SIZE = 100;

export const DEFAULT_PRIMARY_VERSION = "v23";

export const DEFAULT_SECONDARY_VERSION = "v22";

export const DEFAULT_READ_COUNT = 10000;

/**
 * Keys `inspect` lists from the matching set.
 */
export const INSPECT_SAMPLE_KEYS = 5;

// ============================================================================
// Progress & Records
// ============================================================================

/**
 * Wall-clock cadence of progress snapshots for writers and readers.
 */
export const DEFAULT_PROGRESS_INTERVAL_MS = 5000;

/**
 * Number of distinct payloads the record source cycles through.
 */
export const DEFAULT_SAMPLE_COUNT = 100;

/**
 * Environment variable prefix for config overrides.
 */
export const ENV_PREFIX = "GEOKV_";

export const CONFIG_FILE_NAME = "geokv.config.json";

export const TOOL_NAME = "geokv-bench";

export const TOOL_VERSION = "0.3.0";
