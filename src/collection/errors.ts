/**
 * Collection error classes
 */

/**
 * The listing could not be loaded or does not look like a listing
 *
 * Fatal for the run; never retried.
 */
export class PortalUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PortalUnavailableError";
  }
}

/**
 * A collection option is out of range; raised before the listing is touched
 */
export class InvalidCollectionOptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCollectionOptionError";
  }
}

/**
 * A page did not finish loading in time
 *
 * Thrown by page sources; aborts the run.
 */
export class PageSourceTimeoutError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PageSourceTimeoutError";
  }
}
