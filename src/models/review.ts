/**
 * Review record interfaces
 */

import type { Fingerprint } from './document.js';
import type { RuleCode } from './validation.js';

export interface ReviewRecord {
  /** UUID v4 identifier */
  id: string;
  document_id: string;
  fingerprint: Fingerprint;
  /** Exactly one reason per review episode */
  reason_code: RuleCode;
  /** Confidence the validation scorer produced */
  score: number;
  /** Whether the storage adapter moved the artifact into the review area */
  relocated: boolean;
  /** ISO 8601 timestamp */
  created_at: string;
}
