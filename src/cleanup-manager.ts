// Stream Courier - Cleanup Manager
// Scratch storage for downloads and transcodes, partitioned per session:
//   {root}/{sha256(sessionId)[0..16]}/{uuid}.{ext}
//
// Every path handed out by a ScratchScope is deleted before the scope closes,
// whichever way the work inside it ended. Deletion failures are logged and
// never replace the outcome of the work.

import { createHash } from "node:crypto";
import { access, constants, mkdir, readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";

const SESSION_KEY_PATTERN = /^[0-9a-f]{16}$/;

/** Directory name of a session's scratch partition. */
export function sessionKey(sessionId: string): string {
  return createHash("sha256").update(sessionId).digest("hex").substring(0, 16);
}

// ─── ScratchScope ───────────────────────────────────────────────────────────────

export class ScratchScope {
  private readonly registered = new Set<string>();
  private readonly handedOff = new Set<string>();
  private closed = false;

  constructor(
    readonly directory: string,
    private readonly logger: Logger,
  ) {}

  async open(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
  }

  /** Registers and returns a fresh path inside the session directory. */
  allocate(extension: string): string {
    if (this.closed) {
      throw new Error("Scratch scope is already closed");
    }
    const ext = extension.replace(/[^A-Za-z0-9]/g, "") || "bin";
    const path = join(this.directory, `${uuidv4()}.${ext}`);
    this.registered.add(path);
    return path;
  }

  /** Marks `path` as owned by delivery; it is deleted after every intermediate. */
  handOff(path: string): void {
    if (!this.registered.has(path)) {
      throw new Error(`Path is not registered in this scope: ${path}`);
    }
    this.handedOff.add(path);
  }

  /** Deletes `path` now. */
  async discard(path: string): Promise<void> {
    if (!this.registered.delete(path)) return;
    this.handedOff.delete(path);
    await this.remove(path);
  }

  /** Deletes every remaining path, intermediates before handed-off ones, then the directory. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const intermediates = [...this.registered].filter((p) => !this.handedOff.has(p));
    const delivered = [...this.handedOff];
    this.registered.clear();
    this.handedOff.clear();

    for (const path of [...intermediates, ...delivered]) {
      await this.remove(path);
    }
    await this.remove(this.directory);
  }

  private async remove(path: string): Promise<void> {
    try {
      await rm(path, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Failed to delete scratch path ${path}: ${describeError(error)}`);
    }
  }
}

// ─── CleanupManager ─────────────────────────────────────────────────────────────

export class CleanupManager {
  private readonly logger: Logger;

  constructor(
    readonly root: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger("CleanupManager");
  }

  sessionDir(sessionId: string): string {
    return join(this.root, sessionKey(sessionId));
  }

  /**
   * Creates the scratch root, checks it is writable and clears session
   * directories left by a previous run. Entries not named like a session
   * directory are left alone. Called once at startup; failures are fatal there.
   *
   * @returns number of stale session directories removed
   */
  async prepare(): Promise<number> {
    await mkdir(this.root, { recursive: true });
    await access(this.root, constants.W_OK);

    const entries = await readdir(this.root, { withFileTypes: true });
    const leftovers = entries.filter((entry) => entry.isDirectory() && SESSION_KEY_PATTERN.test(entry.name));
    for (const entry of leftovers) {
      await rm(join(this.root, entry.name), { recursive: true, force: true });
    }
    if (leftovers.length > 0) {
      this.logger.info(`Removed ${leftovers.length} stale scratch entr${leftovers.length === 1 ? "y" : "ies"} from ${this.root}`);
    }
    return leftovers.length;
  }

  /**
   * Runs `work` with a scope on the session's scratch directory and closes
   * the scope afterwards, on success or failure.
   */
  async withScope<T>(sessionId: string, work: (scope: ScratchScope) => Promise<T>): Promise<T> {
    const scope = new ScratchScope(this.sessionDir(sessionId), this.logger);
    try {
      await scope.open();
      return await work(scope);
    } finally {
      await scope.close();
    }
  }

  /** Removes everything under the session's scratch directory. */
  async purgeSession(sessionId: string): Promise<void> {
    const dir = this.sessionDir(sessionId);
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Failed to purge scratch directory ${dir}: ${describeError(error)}`);
    }
  }
}
