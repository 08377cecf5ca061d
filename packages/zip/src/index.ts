export { CompressZipListener } from './CompressZipListener.js';
export type { CompressZipListenerOptions } from './CompressZipListener.js';
export { DecompressZipListener } from './DecompressZipListener.js';
export type { DecompressZipListenerOptions } from './DecompressZipListener.js';
