import { readTextFileIfExists, remove, writeTextFileAtomic } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { ManifestError } from '../../utils/errors.js';
import type { TrialEnvironment } from '../validation/types.js';
import { lockfilePath } from './cargo-lock.js';
import { applyManifestEdits } from './manifest-writer.js';
import type { DependencyLocation, ManifestEdit } from './types.js';

/**
 * Snapshot of every file a run may touch, and the only writer of those files
 * during validation. Trials pin `=x.y.z`; the committed result pins `x.y.z`.
 */
export class TrialWorkspace implements TrialEnvironment {
  private readonly targets: ReadonlyMap<string, DependencyLocation[]>;
  private readonly originals: Map<string, string>;
  private readonly written: Map<string, string>;
  private readonly lockPath: string;
  private readonly originalLock: string | null;

  private constructor(
    targets: ReadonlyMap<string, DependencyLocation[]>,
    originals: Map<string, string>,
    lockPath: string,
    originalLock: string | null
  ) {
    this.targets = targets;
    this.originals = originals;
    this.written = new Map(originals);
    this.lockPath = lockPath;
    this.originalLock = originalLock;
  }

  /**
   * @param targets direct crate → every manifest location declaring it
   */
  static async open(rootDir: string, targets: ReadonlyMap<string, DependencyLocation[]>): Promise<TrialWorkspace> {
    const originals = new Map<string, string>();
    for (const locations of targets.values()) {
      for (const location of locations) {
        if (originals.has(location.manifestPath)) {
          continue;
        }
        const content = await readTextFileIfExists(location.manifestPath);
        if (content === null) {
          throw new ManifestError(`Manifest disappeared: ${location.manifestPath}`, { manifestPath: location.manifestPath });
        }
        originals.set(location.manifestPath, content);
      }
    }

    const lockPath = lockfilePath(rootDir);
    const originalLock = await readTextFileIfExists(lockPath);
    logger.debug('Opened trial workspace', { manifests: [...originals.keys()], lockfile: originalLock !== null });
    return new TrialWorkspace(targets, originals, lockPath, originalLock);
  }

  get manifestPaths(): string[] {
    return [...this.originals.keys()];
  }

  async applyTrial(pins: ReadonlyMap<string, string>): Promise<void> {
    await this.writePins(pins, version => `=${version}`);
  }

  async commit(pins: ReadonlyMap<string, string>): Promise<void> {
    // Edits always start from the snapshots, so trial pins never leak into the result.
    await this.writePins(pins, version => version);
  }

  async restore(): Promise<void> {
    for (const [path, content] of this.originals) {
      await this.writeIfChanged(path, content);
    }

    if (this.originalLock === null) {
      await remove(this.lockPath);
    } else {
      const current = await readTextFileIfExists(this.lockPath);
      if (current !== this.originalLock) {
        await writeTextFileAtomic(this.lockPath, this.originalLock);
      }
    }
    logger.debug('Restored manifests and lockfile');
  }

  private async writePins(pins: ReadonlyMap<string, string>, format: (version: string) => string): Promise<void> {
    const editsByManifest = new Map<string, ManifestEdit[]>();
    for (const [crate, version] of pins) {
      for (const location of this.targets.get(crate) ?? []) {
        const edits = editsByManifest.get(location.manifestPath) ?? [];
        edits.push({ table: location.table, key: location.key, requirement: format(version) });
        editsByManifest.set(location.manifestPath, edits);
      }
    }

    for (const [path, original] of this.originals) {
      const edits = editsByManifest.get(path);
      const next = edits ? applyManifestEdits(original, edits, path) : original;
      await this.writeIfChanged(path, next);
    }
  }

  private async writeIfChanged(path: string, content: string): Promise<void> {
    if (this.written.get(path) === content) {
      return;
    }
    await writeTextFileAtomic(path, content);
    this.written.set(path, content);
  }
}
