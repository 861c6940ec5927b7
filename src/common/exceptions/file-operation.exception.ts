export type FileOperation = 'store' | 'delete' | 'read' | 'stat';

export class FileOperationException extends Error {
  constructor(
    message: string,
    public readonly operation: FileOperation,
    public readonly ref?: string,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = 'FileOperationException';
  }
}
