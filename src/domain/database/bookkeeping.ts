/** Table holding the recorded schema version, and the row key inside it. */
export const BOOKKEEPING_TABLE = 'meta';
export const SCHEMA_VERSION_KEY = 'schema_version';
