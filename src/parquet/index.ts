/**
 * Parquet Module
 *
 * Reads dataset rows and their feature schema from Parquet files with
 * hyparquet.
 */

export {
  ParquetRowSource,
  initializeAsyncBuffer,
  featuresFromKeyValueMetadata,
  FEATURES_METADATA_KEY,
  type RowSource,
  type ParquetRowSourceOptions,
} from './row-source'
