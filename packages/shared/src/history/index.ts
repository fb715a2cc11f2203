export { digestOf } from "./digest.js"
export {
  isIntactCheckpoint,
  listSegmentNumbers,
  scanSegment,
  segmentFileName,
} from "./reader.js"
export { recoverHistory } from "./recovery.js"
export {
  type HistoryRecord,
  HistoryRecordSchema,
  type HistoryRecordType,
  HistoryRecordTypeSchema,
  type RecoveryState,
  type RotationResult,
  type SegmentScanResult,
} from "./types.js"
export { type AppendableRecord, HistoryWriter } from "./writer.js"
