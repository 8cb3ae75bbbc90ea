/**
 * Default request timeout in milliseconds
 */
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Longest timeout a timer accepts, in milliseconds (2^32 - 1)
 */
export const MAX_TIMEOUT_MS = 4_294_967_295;

/**
 * Number of redirects followed before a request fails with RedirectLimitError
 */
export const DEFAULT_MAX_REDIRECTIONS = 10;

/**
 * Redirect limit used once `followRedirects()` lifts the default policy
 */
export const UNLIMITED_REDIRECTIONS = Number.MAX_SAFE_INTEGER;

/**
 * Handshake timeout of the default WebSocket dial configuration
 */
export const WEBSOCKET_HANDSHAKE_TIMEOUT_MS = 45_000;

/**
 * Extension used when a download has no usable Content-Type
 */
export const DEFAULT_DOWNLOAD_EXTENSION = '.jpg';

/**
 * File name used when the download URL path ends with a slash
 */
export const DEFAULT_DOWNLOAD_NAME = 'download';

/**
 * Sentinel accepted by `withUserAgent` to pick a generated user agent
 */
export const RANDOM_USER_AGENT = 'random';

/**
 * Longest proxy URL accepted by `withProxy`
 */
export const MAX_PROXY_URL_LENGTH = 2048;

/**
 * Project-local configuration directory and the file name looked up in each configuration directory
 */
export const CONFIG_DIR_NAME = '.chainreq';
export const CONFIG_FILE_NAME = 'config.json';
