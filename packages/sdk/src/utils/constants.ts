/**
 * Default API base URL
 */
export const DEFAULT_BASE_URL = "https://api.invoiceiq.fr";

/**
 * Default request timeout (30 seconds)
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Maximum file size (100MB)
 */
export const MAX_FILE_SIZE = 100 * 1024 * 1024;

/**
 * Supported file extensions
 */
export const SUPPORTED_EXTENSIONS = [".pdf", ".xml"] as const;

/**
 * Default polling interval (1 second)
 */
export const DEFAULT_POLL_INTERVAL = 1000;

/**
 * Default maximum wait time (1 minute)
 */
export const DEFAULT_MAX_WAIT = 60000;

/**
 * Default growth of the polling delay after each pending observation
 */
export const DEFAULT_BACKOFF_FACTOR = 1.5;

/** Longest delay a Node timer honours; larger values fire after 1ms */
export const MAX_POLL_DELAY = 2 ** 31 - 1;

export const DEFAULT_COMPLETED_STATUS = "COMPLETED";

export const DEFAULT_FAILED_STATUSES = ["FAILED", "CANCELED"] as const;

/**
 * SDK version
 */
export const SDK_VERSION = "0.1.0";
