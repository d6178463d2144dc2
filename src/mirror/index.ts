export { MirrorManager } from './mirror-manager.js';
export { formatMirrorReport } from './report.js';

export type { MirrorManagerConfig } from './mirror-manager.js';
export type { MirrorOptions, MirrorReport } from './types.js';
