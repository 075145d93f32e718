/**
 * Error thrown when a scan root does not exist.
 */
export class DirectoryNotFoundError extends Error {
  constructor(readonly directory: string) {
    super(`The directory '${directory}' does not exist`);
    this.name = 'DirectoryNotFoundError';
  }
}
