/**
 * Embeddings API client constants
 */

/**
 * Texts sent per /embeddings request
 */
export const EMBEDDINGS_BATCH_SIZE = 64;

/**
 * Request timeout in milliseconds (embedding large batches can be slow)
 */
export const EMBEDDINGS_HTTP_TIMEOUT_MS = 60_000;

/**
 * Maximum attempts per request (retries only apply to transient failures)
 */
export const EMBEDDINGS_HTTP_MAX_ATTEMPTS = 3;
