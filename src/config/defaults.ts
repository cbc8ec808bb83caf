/**
 * Default configuration values
 */

export const KNOWLEDGE_BASE_DEFAULTS = {
  KB_PATH: 'data/guidelines.json',
  SYNONYMS_PATH: 'data/synonyms.json',
  DB_PATH: 'guidelines.db',
  ENABLE_SYNONYMS: true,
};

export const API_DEFAULTS = {
  PORT: 3001,
  JSON_BODY_LIMIT: '100kb',
};

export const SQLITE_EXTENSIONS = ['.db', '.sqlite', '.sqlite3'];
