/**
 * Moves source artifacts from the inbox into per-reason review folders:
 * <reviewDir>/<REASON_CODE>/<file name>
 *
 * @module adapters/storage/review-relocator
 */

import { copyFile, mkdir, rename, unlink } from 'fs/promises';
import path from 'path';
import type { FileRef } from '../../../models/document.js';
import type { RuleCode } from '../../../models/validation.js';

function isCrossDevice(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'EXDEV';
}

export class LocalReviewRelocator {
  constructor(
    private readonly inboxDir: string,
    private readonly reviewDir: string
  ) {}

  targetPath(ref: FileRef, reasonCode: RuleCode): string {
    return path.join(this.reviewDir, reasonCode, path.basename(ref.name));
  }

  async relocate(ref: FileRef, reasonCode: RuleCode): Promise<string> {
    const source = path.join(this.inboxDir, ref.source_id);
    const target = this.targetPath(ref, reasonCode);
    await mkdir(path.dirname(target), { recursive: true });

    try {
      await rename(source, target);
    } catch (error) {
      if (!isCrossDevice(error)) throw error;
      await copyFile(source, target);
      await unlink(source);
    }
    console.error(`[ReviewRelocator] ${ref.source_id} -> ${target}`);
    return target;
  }
}
