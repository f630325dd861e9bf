/**
 * Storage module exports.
 */

export type { DataCodec } from './codecs.js';
export { BUILTIN_CODECS, jsonCodec } from './codecs.js';
export type { FileDataStoreConfig } from './data-store.js';
export { FileDataStore, createFileDataStore } from './data-store.js';
export {
  PersistenceError,
  UnknownFormatError,
  DataLoadError,
  DataSaveError,
  DataFileMissingError,
  isRecoverableLoadError,
  type PersistenceErrorCode,
} from './errors.js';
