/**
 * Shai-Hulud indicators and scanner defaults
 */

export const VERSION = '1.0.0';

/** SHA-256 of the worm's bundle.js payload */
export const BUNDLE_HASH = '46faab8ab153fae6e80e7cca38eab363075bb524edd79e42269217a083628f09';

export const BUNDLE_FILENAME = 'bundle.js';

export const SUSPICIOUS_POSTINSTALL = /(node\s+bundle\.js|trufflehog|webhook\.site|exfiltrat)/i;

export const SUSPICIOUS_IOCS = /(webhook\.site|bb8ca5f6-4175-45d2-b042-fc9ebb8170b7|shai-hulud|trufflehog)/i;

export const GITHUB_TOKEN_PATTERN = /ghp_[a-zA-Z0-9]{36}|gho_[a-zA-Z0-9]{36}/;

// 10MB
export const MAX_FILE_SIZE = 10 * 1024 * 1024;

// Maximum lockfile size (100MB) to prevent DoS via large file parsing
export const MAX_LOCKFILE_SIZE = 100 * 1024 * 1024;

export const DEFAULT_BADLIST_URL =
  'https://raw.githubusercontent.com/Amruth-SV/shai-hulud-scanner/main/affected-packages.json';

export const BADLIST_CACHE_FILENAME = 'affected-packages-cache.json';

export const HTTP_TIMEOUT = 10_000;

export const GITHUB_API_URL = 'https://api.github.com';
