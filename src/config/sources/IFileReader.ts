/**
 * File reader
 *
 * Abstracts filesystem access for `useConfigFile()`.
 */

export interface IFileReader {
  /**
   * Reads the whole file at `path`.
   *
   * @throws Whatever the underlying source raises when the file cannot be
   *         opened or read. Callers treat any rejection as fatal.
   */
  read(path: string): Promise<Uint8Array>;
}
