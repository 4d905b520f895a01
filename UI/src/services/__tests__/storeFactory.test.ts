import { CsvUsabilityStore } from '../csvUsabilityStore';
import { DexieUsabilityStore } from '../dexieUsabilityStore';
import { StoreConfig, createUsabilityStore } from '../storeFactory';
import { TEST_FILE_NAMES } from './memoryFileSystem';

function config(overrides: Partial<StoreConfig> = {}): StoreConfig {
  return {
    backend: 'database',
    databaseName: 'usability_test',
    csvKeyPrefix: 'factory/',
    csvFileNames: TEST_FILE_NAMES,
    ...overrides,
  };
}

describe('createUsabilityStore', () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    localStorage.clear();
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
  });

  it('builds the CSV store on localStorage for the csv backend', async () => {
    const store = createUsabilityStore(config({ backend: 'csv' }));

    expect(store).toBeInstanceOf(CsvUsabilityStore);
    expect(store.backend).toBe('csv');

    await store.append('consent', { timestamp: '2026-02-10 10:00:00', consentGiven: true });
    expect(localStorage.getItem('factory/consent_data.csv')).toBe(
      'timestamp,consent_given\n2026-02-10 10:00:00,true\n'
    );
    expect(log).toHaveBeenCalledWith('Using CSV storage under prefix:', 'factory/');
  });

  it('builds the IndexedDB store for the database backend', () => {
    const store = createUsabilityStore(config());

    expect(store).toBeInstanceOf(DexieUsabilityStore);
    expect(store.backend).toBe('database');
    expect(log).toHaveBeenCalledWith('Using IndexedDB storage:', 'usability_test');
  });
});
