/**
 * Markup integrity checks, snapshots and rollback.
 */

export {
  StructurePreserver,
  analyzeStructure,
  generateChecksum,
  textSimilarity,
  type ContentStructure,
  type HeadingEntry,
  type ImageAttributes,
  type Violation,
  type ViolationType,
  type IntentWarning,
  type IntentWarningType,
  type IntegrityReport,
  type StructureSnapshot,
  type PreservationResult,
  type CorruptionReport,
  type ChecksumRecord,
  type PreservationStats,
  type StructurePreserverOptions,
} from "./structure-preserver.js";
