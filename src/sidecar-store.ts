/**
 * Sidecar Store - Per-unit artifact files kept beside the unit's source.
 *
 * Layout for `app/controllers/blog/posts_controller.rb`:
 *
 *   app/controllers/blog/.harden/posts_controller/analysis.json
 *   app/controllers/blog/.harden/posts_controller/decision.json
 *   app/controllers/blog/.harden/posts_controller/hardened.json
 *   app/controllers/blog/.harden/posts_controller/hardened_preview.rb
 *   app/controllers/blog/.harden/posts_controller/verification.json
 *
 * Every unit owns its own directory and every phase its own file name, so
 * concurrent workers never write the same path and no file locking is
 * needed.
 *
 * @module sidecar-store
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { SidecarPathError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ArtifactName =
  | 'analysis.json'
  | 'decision.json'
  | 'hardened.json'
  | 'verification.json'
  | `hardened_preview${string}`;

export interface SidecarStoreOptions {
  /** Hidden directory created beside each unit (default: `.harden`). */
  dirName?: string;
  /**
   * Sidecar directories must resolve inside one of these roots. Empty
   * disables the check.
   */
  allowedRoots?: string[];
}

export const DEFAULT_SIDECAR_DIR = '.harden';

// ---------------------------------------------------------------------------
// SidecarStore
// ---------------------------------------------------------------------------

export class SidecarStore {
  private readonly dirName: string;
  private readonly allowedRoots: string[];

  constructor(options: SidecarStoreOptions = {}) {
    this.dirName = options.dirName ?? DEFAULT_SIDECAR_DIR;
    this.allowedRoots = (options.allowedRoots ?? []).map((root) => path.resolve(root));
  }

  /**
   * Directory holding the artifacts of the unit at `unitFullPath`.
   */
  dirFor(unitFullPath: string): string {
    const stem = path.basename(unitFullPath, path.extname(unitFullPath));
    return path.join(path.dirname(unitFullPath), this.dirName, stem);
  }

  pathFor(unitFullPath: string, artifactName: ArtifactName): string {
    return path.join(this.dirFor(unitFullPath), artifactName);
  }

  /**
   * Write an artifact, creating the unit's sidecar directory if needed.
   *
   * @returns The absolute path written.
   * @throws {SidecarPathError} If the directory resolves outside the allowed roots.
   */
  write(unitFullPath: string, artifactName: ArtifactName, content: string): string {
    const dir = this.dirFor(unitFullPath);
    this.assertAllowed(path.resolve(dir), dir);

    fs.mkdirSync(dir, { recursive: true });
    // A symlinked parent can still point elsewhere once resolved.
    this.assertAllowed(fs.realpathSync(dir), dir);

    const target = path.join(dir, artifactName);
    fs.writeFileSync(target, content.endsWith('\n') ? content : `${content}\n`, 'utf-8');
    return target;
  }

  writeJson(unitFullPath: string, artifactName: ArtifactName, value: unknown): string {
    return this.write(unitFullPath, artifactName, JSON.stringify(value, null, 2));
  }

  read(unitFullPath: string, artifactName: ArtifactName): string | null {
    const target = this.pathFor(unitFullPath, artifactName);
    if (!fs.existsSync(target)) return null;
    return fs.readFileSync(target, 'utf-8');
  }

  /**
   * Names of the artifacts currently on disk for a unit, sorted.
   */
  list(unitFullPath: string): string[] {
    const dir = this.dirFor(unitFullPath);
    if (!fs.existsSync(dir)) return [];
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  }

  private assertAllowed(resolved: string, original: string): void {
    if (this.allowedRoots.length === 0) return;

    const inside = this.allowedRoots.some((root) => {
      const realRoot = fs.existsSync(root) ? fs.realpathSync(root) : root;
      return resolved.startsWith(`${realRoot}${path.sep}`) || resolved.startsWith(`${root}${path.sep}`);
    });
    if (!inside) {
      throw new SidecarPathError(original);
    }
  }
}

/**
 * Artifact name for the hardened-source preview of a unit.
 */
export function previewArtifactName(unitFullPath: string): ArtifactName {
  return `hardened_preview${path.extname(unitFullPath)}`;
}
