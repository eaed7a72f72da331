// Audit trail exports

export { AuditTrail } from './trail.js';
export { TrailBuilder } from './trail-builder.js';
export { captureChanges } from './capture.js';
export type { CapturedChanges, CaptureOptions } from './capture.js';

// Encoding
export { ChangeSetCodec, DEFAULT_SPAN_INLINE_LIMIT } from './change-set-codec.js';
export type { ChangeSetCodecOptions, EncodedChangeSet } from './change-set-codec.js';
export { scanTopLevelValue } from './json-scan.js';
export type { ScanResult } from './json-scan.js';
