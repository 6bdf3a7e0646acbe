/**
 * Version information for oauth-relay
 *
 * Single source of truth for version number.
 * Import this instead of hardcoding version strings.
 */

// Keep in sync with package.json
export const VERSION = '1.0.0';
export const SERVER_NAME = 'oauth-relay';
