/**
 * Configuration constants
 */

export const LEGACY_CONFIG_FILENAME = 'ragprep.ini';
export const DEFAULT_CONFIG_FILENAME = '.ragprep.ini';

export const DEFAULT_MIN_CHUNK_SIZE = 200;
export const DEFAULT_TARGET_CHUNK_SIZE = 400;
export const DEFAULT_MAX_CHUNK_SIZE = 500;
export const DEFAULT_OVERLAP_PERCENTAGE = 0.1;

export const DEFAULT_MIN_CONFIDENCE_THRESHOLD = 0.6;
export const DEFAULT_MAX_LINK_DENSITY = 0.3;
export const DEFAULT_MIN_TEXT_LENGTH = 25;
// Asides with less text than this are page chrome
export const MIN_ASIDE_TEXT_LENGTH = 100;

export const UNTITLED_SECTION = 'Untitled';
export const UNTITLED_HTML_DOCUMENT = 'Untitled HTML Document';
export const MAX_DOCUMENT_ID_LENGTH = 64;
