/**
 * @fileoverview Source scanning
 */

export {
  createScanProject,
  scanSourceFiles,
  scanWorkspace,
  unwrapTypeName,
  type ClusterStrategy,
  type ScanOptions,
} from './ts_scanner.js';
