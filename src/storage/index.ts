/**
 * Storage module - content-addressed storage for derived assets
 */

export {
  ContentAddressedStorage,
  type AssetStore,
  type StorageCategory,
  type StoreResult,
  type StorageConfig
} from './content-addressed.js';
