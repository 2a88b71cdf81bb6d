import { mkdirSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

export type ScreenshotKind =
  | 'protection'
  | 'captcha'
  | 'unknown_state'
  | 'success'
  | 'resume_captcha'
  | 'resume_unknown_state'
  | 'resume_success';

/**
 * File layout under the storage directory:
 *   <jobId>.log.jsonl          job trace
 *   <jobId>_<kind>.png         latest screenshot of each kind
 *   <jobId>_profile/           persistent browser profile
 */
export class ArtifactStore {
  readonly root: string;

  constructor(storageDir: string) {
    this.root = resolve(storageDir);
    mkdirSync(this.root, { recursive: true });
  }

  logPath(jobId: string): string {
    return join(this.root, `${jobId}.log.jsonl`);
  }

  profileDir(jobId: string): string {
    const dir = join(this.root, `${jobId}_profile`);
    mkdirSync(dir, { recursive: true });
    return dir;
  }

  screenshotPath(jobId: string, kind: ScreenshotKind): string {
    return join(this.root, `${jobId}_${kind}.png`);
  }

  /** Write (or overwrite) the screenshot for this kind and return its path. */
  saveScreenshot(jobId: string, kind: ScreenshotKind, bytes: Buffer): string {
    const path = this.screenshotPath(jobId, kind);
    writeFileSync(path, bytes);
    return path;
  }
}
