import { CsvUsabilityStore, localStorageFileSystem } from '../csvUsabilityStore';
import { TaskRecord } from '../../types/usability';
import { TEST_FILE_NAMES, memoryFileSystem } from './memoryFileSystem';

function task(overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    timestamp: '2026-02-10 10:00:00',
    taskName: 'Task 1: Wait for User Input',
    outcome: 'Yes',
    durationSeconds: 2.5,
    notes: '',
    ...overrides,
  };
}

describe('CsvUsabilityStore', () => {
  it('returns an empty result before any write', async () => {
    const store = new CsvUsabilityStore(memoryFileSystem(), TEST_FILE_NAMES);
    await expect(store.readAll('consent')).resolves.toEqual([]);
    await expect(store.readAll('tasks')).resolves.toEqual([]);
  });

  it('writes the header once and appends one line per record', async () => {
    const files = memoryFileSystem();
    const store = new CsvUsabilityStore(files, TEST_FILE_NAMES);

    await store.append('tasks', task({ notes: 'clicked back, then retried' }));
    await store.append('tasks', task({ outcome: 'No', durationSeconds: null }));

    expect(files.files.get('task_data.csv')).toBe(
      'timestamp,task_name,success,duration_seconds,notes\n' +
        '2026-02-10 10:00:00,Task 1: Wait for User Input,Yes,2.5,"clicked back, then retried"\n' +
        '2026-02-10 10:00:00,Task 1: Wait for User Input,No,,\n'
    );
  });

  it('reads records back in insertion order', async () => {
    const store = new CsvUsabilityStore(memoryFileSystem(), TEST_FILE_NAMES);
    await store.append('exit', { timestamp: 'a', satisfaction: 5, difficulty: 1, openFeedback: 'first' });
    await store.append('exit', { timestamp: 'b', satisfaction: 3, difficulty: 4, openFeedback: 'second\nline' });

    const rows = await store.readAll('exit');
    expect(rows.map((row) => row.openFeedback)).toEqual(['first', 'second\nline']);
    expect(rows[1]).toEqual({ timestamp: 'b', satisfaction: 3, difficulty: 4, openFeedback: 'second\nline' });
  });

  it('keeps an absent duration as null through the file', async () => {
    const store = new CsvUsabilityStore(memoryFileSystem(), TEST_FILE_NAMES);
    await store.append('tasks', task({ durationSeconds: null }));

    const [row] = await store.readAll('tasks');
    expect(row.durationSeconds).toBeNull();
  });

  it('caps reads at the requested limit', async () => {
    const store = new CsvUsabilityStore(memoryFileSystem(), TEST_FILE_NAMES);
    for (const stamp of ['1', '2', '3']) {
      await store.append('consent', { timestamp: stamp, consentGiven: true });
    }

    const rows = await store.readAll('consent', { limit: 2 });
    expect(rows.map((row) => row.timestamp)).toEqual(['1', '2']);
    await expect(store.readAll('consent', { limit: 0 })).rejects.toThrow(RangeError);
  });

  it('appends to an existing file without rewriting its header', async () => {
    const files = memoryFileSystem({ 'consent_data.csv': 'timestamp,consent_given\nold,True' });
    const store = new CsvUsabilityStore(files, TEST_FILE_NAMES);

    await store.append('consent', { timestamp: 'new', consentGiven: true });

    expect(files.files.get('consent_data.csv')).toBe('timestamp,consent_given\nold,True\nnew,true\n');
    const rows = await store.readAll('consent');
    expect(rows).toEqual([
      { timestamp: 'old', consentGiven: true },
      { timestamp: 'new', consentGiven: true },
    ]);
  });

  it('rejects rows that cannot be decoded', async () => {
    const files = memoryFileSystem({
      'demographic_data.csv': 'timestamp,name,age,occupation,familiarity\nt,,forty,Chef,Very Familiar\n',
    });
    const store = new CsvUsabilityStore(files, TEST_FILE_NAMES);

    await expect(store.readAll('demographics')).rejects.toMatchObject({ name: 'StorageError', table: 'demographics' });
  });

  it('refuses to read or append to a file that ends inside a quoted field', async () => {
    const broken = 'timestamp,satisfaction,difficulty,open_feedback\nold,3,3,"unterminated\n';
    const files = memoryFileSystem({ 'exit_data.csv': broken });
    const store = new CsvUsabilityStore(files, TEST_FILE_NAMES);

    await expect(store.readAll('exit')).rejects.toMatchObject({ name: 'StorageError', table: 'exit' });
    await expect(
      store.append('exit', { timestamp: 'new', satisfaction: 5, difficulty: 1, openFeedback: 'after' })
    ).rejects.toMatchObject({ name: 'StorageError', table: 'exit' });
    expect(files.files.get('exit_data.csv')).toBe(broken);
  });

  it('persists files through localStorage under the key prefix', async () => {
    localStorage.clear();
    const store = new CsvUsabilityStore(localStorageFileSystem(localStorage, 'test/'), TEST_FILE_NAMES);

    await store.append('consent', { timestamp: '2026-02-10 10:00:00', consentGiven: true });

    expect(localStorage.getItem('test/consent_data.csv')).toBe('timestamp,consent_given\n2026-02-10 10:00:00,true\n');
  });
});
