/**
 * Configuration sources consumed by the credential resolver.
 */

export type { IEnvironment } from './IEnvironment.js';
export type { IFileReader } from './IFileReader.js';
export { ProcessEnvironment, StaticEnvironment } from './providers/ProcessEnvironment.js';
export { FsFileReader } from './providers/FsFileReader.js';
