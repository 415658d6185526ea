import type { ManifestSummary } from '@/ui/formatters/index.js';
import type { RpcResponse } from '@/protocol/index.js';

/**
 * Result of `dgramlink send`.
 */
export interface SendResult {
  requestId?: string;
  command: string;
  /** Absent for notifications */
  response?: RpcResponse;
  /** Round-trip time in milliseconds */
  elapsedMs: number;
}

/**
 * Result of `dgramlink validate-manifest`.
 */
export interface ValidateManifestResult {
  file: string;
  valid: boolean;
  summary?: ManifestSummary;
  error?: string;
  field?: string;
}
