/**
 * LIBRARY_VERSION is an exported constant used by public APIs.
 */
export const LIBRARY_VERSION = "0.1.0" as const;
/**
 * IMPLEMENTATION_ID is an exported constant used by public APIs.
 */
export const IMPLEMENTATION_ID: string = `cellwidth@${LIBRARY_VERSION}`;
