/**
 * Mount Resolver
 * Finds where a sampler's storage is mounted and tells normal disk mode
 * apart from the firmware upgrade volume.
 */

import { readdir, stat } from "fs/promises";
import { join } from "path";
import type { DeviceKind } from "../devices/catalog";
import { createLogger } from "../logger";

export type MountMode = "storage" | "upgrade";

export interface MountResult {
  path: string;
  mode: MountMode;
}

export type ValidationResult = { valid: true } | { valid: false; reason: string };

export interface MountResolverOptions {
  platform?: NodeJS.Platform;
  /** macOS volumes directory */
  volumesRoot?: string;
}

const log = createLogger("MountResolver");

const DRIVE_LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ".split("");

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check that a folder has the directory layout of the given device
 */
export async function validateStructure(kind: DeviceKind, mountPath: string | null): Promise<ValidationResult> {
  if (!mountPath) {
    return {
      valid: false,
      reason: `Please connect your ${kind.name} and try again. If it isn't being detected, go to Utility Settings, enable developer mode, and select the device path.`,
    };
  }

  if (!(await exists(mountPath))) {
    return { valid: false, reason: `${kind.name} mount path does not exist: ${mountPath}` };
  }

  for (const dir of kind.requiredDirectories) {
    const dirPath = join(mountPath, dir);
    if (!(await exists(dirPath))) {
      return { valid: false, reason: `Invalid ${kind.name} folder: '${dir}' directory not found.` };
    }
    if (!(await isDirectory(dirPath))) {
      return { valid: false, reason: `Invalid ${kind.name} folder: '${dir}' exists but is not a directory.` };
    }
  }

  // Users may leave some categories unused; reject only if none are there
  if (kind.sampleCategories.length > 0) {
    const parent = join(mountPath, kind.requiredDirectories[0]);
    const present = await Promise.all(kind.sampleCategories.map((c) => exists(join(parent, c))));
    if (!present.some(Boolean)) {
      return { valid: false, reason: `Invalid ${kind.name} folder: No sample category folders found.` };
    }
  }

  return { valid: true };
}

/**
 * True if any upgrade mode marker sits directly under the root
 */
export async function hasUpgradeMarkers(kind: DeviceKind, root: string): Promise<boolean> {
  for (const marker of kind.upgradeModeMarkers) {
    if (await exists(join(root, marker))) {
      return true;
    }
  }
  return false;
}

export class MountResolver {
  private platform: NodeJS.Platform;
  private volumesRoot: string;

  constructor(options: MountResolverOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.volumesRoot = options.volumesRoot ?? "/Volumes";
  }

  /**
   * Whether this host has a mount scan at all
   */
  get supported(): boolean {
    return this.platform === "darwin" || this.platform === "win32";
  }

  /**
   * Candidate mount roots in scan order
   */
  async listCandidates(): Promise<string[]> {
    if (this.platform === "darwin") {
      let entries: string[];
      try {
        entries = await readdir(this.volumesRoot);
      } catch (err) {
        log.debug(`Cannot list ${this.volumesRoot}:`, err);
        return [];
      }
      const roots = entries.sort().map((name) => join(this.volumesRoot, name));
      const dirs = await Promise.all(roots.map(isDirectory));
      return roots.filter((_, i) => dirs[i]);
    }

    if (this.platform === "win32") {
      const roots = DRIVE_LETTERS.map((letter) => `${letter}:\\`);
      const present = await Promise.all(roots.map(exists));
      return roots.filter((_, i) => present[i]);
    }

    return [];
  }

  /**
   * Find the device's mount point
   * @returns null when no candidate matches or the platform has no scan
   */
  async findMount(kind: DeviceKind): Promise<MountResult | null> {
    if (!this.supported) return null;

    for (const root of await this.listCandidates()) {
      // An upgrade volume lacks the normal layout, so markers go first
      if (await hasUpgradeMarkers(kind, root)) {
        return { path: root, mode: "upgrade" };
      }

      const result = await validateStructure(kind, root);
      if (result.valid) {
        return { path: root, mode: "storage" };
      }
    }

    return null;
  }
}
