import { TextFileSystem } from '../csvUsabilityStore';

export interface MemoryFileSystem extends TextFileSystem {
  files: Map<string, string>;
}

export function memoryFileSystem(initial: Record<string, string> = {}): MemoryFileSystem {
  const files = new Map(Object.entries(initial));
  return {
    files,
    read: (fileName) => files.get(fileName) ?? null,
    write: (fileName, content) => {
      files.set(fileName, content);
    },
  };
}

export const TEST_FILE_NAMES = {
  consent: 'consent_data.csv',
  demographics: 'demographic_data.csv',
  tasks: 'task_data.csv',
  exit: 'exit_data.csv',
};
