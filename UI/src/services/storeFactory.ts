import { STORAGE_CONFIG } from '../config/usabilityConfig';
import { StorageBackend, TableName } from '../types/usability';
import { CsvUsabilityStore, localStorageFileSystem } from './csvUsabilityStore';
import { DexieUsabilityStore } from './dexieUsabilityStore';
import { UsabilityStore } from './usabilityStore';

export interface StoreConfig {
  backend: StorageBackend;
  databaseName: string;
  csvKeyPrefix: string;
  csvFileNames: Record<TableName, string>;
}

export function createUsabilityStore(config: StoreConfig = STORAGE_CONFIG): UsabilityStore {
  if (config.backend === 'csv') {
    console.log('Using CSV storage under prefix:', config.csvKeyPrefix);
    return new CsvUsabilityStore(localStorageFileSystem(window.localStorage, config.csvKeyPrefix), config.csvFileNames);
  }

  console.log('Using IndexedDB storage:', config.databaseName);
  return new DexieUsabilityStore({ databaseName: config.databaseName });
}
