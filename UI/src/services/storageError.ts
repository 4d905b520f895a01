import { TableName } from '../types/usability';

/** Raised when a stored row cannot be turned back into its record type */
export class StorageError extends Error {
  constructor(
    message: string,
    public table?: TableName,
    public details?: unknown
  ) {
    super(message);
    this.name = 'StorageError';
  }
}
