// Unit tests for CleanupManager and ScratchScope

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import { CleanupManager, sessionKey } from "./cleanup-manager.js";

function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("sessionKey", () => {
  it("is 16 hex characters and stable per session", () => {
    expect(sessionKey("alice")).toMatch(/^[0-9a-f]{16}$/);
    expect(sessionKey("alice")).toBe(sessionKey("alice"));
    expect(sessionKey("alice")).not.toBe(sessionKey("bob"));
  });
});

describe("CleanupManager", () => {
  let tmp: string;
  let root: string;
  let cleanup: CleanupManager;

  beforeEach(async () => {
    tmp = await mkdtemp(join(tmpdir(), "courier-cleanup-"));
    root = join(tmp, "scratch");
    cleanup = new CleanupManager(root, silentLogger());
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  describe("prepare", () => {
    it("creates a missing scratch root", async () => {
      await expect(cleanup.prepare()).resolves.toBe(0);
      expect(existsSync(root)).toBe(true);
    });

    it("removes session directories left by a previous run", async () => {
      await mkdir(join(root, "0123456789abcdef"), { recursive: true });
      await writeFile(join(root, "0123456789abcdef", "stale.mp4"), "x");
      await mkdir(cleanup.sessionDir("alice"), { recursive: true });

      await expect(cleanup.prepare()).resolves.toBe(2);
      expect(await readdir(root)).toEqual([]);
    });

    it("leaves entries it did not create untouched", async () => {
      await mkdir(join(root, "src"), { recursive: true });
      await writeFile(join(root, "src", "index.ts"), "x");
      await writeFile(join(root, "important.txt"), "keep me");
      await writeFile(join(root, "fedcba9876543210"), "a file, not a session directory");
      await mkdir(join(root, "0123456789ABCDEF"), { recursive: true });

      await expect(cleanup.prepare()).resolves.toBe(0);
      expect((await readdir(root)).sort()).toEqual(["0123456789ABCDEF", "fedcba9876543210", "important.txt", "src"]);
      expect(await readFile(join(root, "important.txt"), "utf-8")).toBe("keep me");
    });

    it("fails when the root is not a directory", async () => {
      const file = join(tmp, "not-a-dir");
      await writeFile(file, "x");

      await expect(new CleanupManager(file, silentLogger()).prepare()).rejects.toThrow();
    });
  });

  describe("withScope", () => {
    it("allocates unique paths inside the session directory", async () => {
      await cleanup.withScope("alice", async (scope) => {
        const a = scope.allocate("mp4");
        const b = scope.allocate("mp4");

        expect(a).not.toBe(b);
        expect(dirname(a)).toBe(cleanup.sessionDir("alice"));
        expect(basename(a)).toMatch(/^[0-9a-f-]{36}\.mp4$/);
        expect(existsSync(scope.directory)).toBe(true);
      });
    });

    it("sanitizes extensions and falls back to .bin", async () => {
      await cleanup.withScope("alice", async (scope) => {
        expect(scope.allocate(".m4a").endsWith(".m4a")).toBe(true);
        expect(scope.allocate("").endsWith(".bin")).toBe(true);
        expect(scope.allocate("../x").endsWith(".x")).toBe(true);
      });
    });

    it("returns the work's result and deletes everything afterwards", async () => {
      let paths: string[] = [];
      const result = await cleanup.withScope("alice", async (scope) => {
        const raw = scope.allocate("m4a");
        const mp3 = scope.allocate("mp3");
        await writeFile(raw, "raw");
        await writeFile(mp3, "mp3");
        scope.handOff(mp3);
        paths = [raw, mp3];
        return "delivered";
      });

      expect(result).toBe("delivered");
      expect(paths.some((p) => existsSync(p))).toBe(false);
      expect(existsSync(cleanup.sessionDir("alice"))).toBe(false);
    });

    it("deletes everything when the work throws", async () => {
      let path = "";
      await expect(
        cleanup.withScope("alice", async (scope) => {
          path = scope.allocate("mp4");
          await writeFile(path, "partial");
          throw new Error("fetch failed");
        }),
      ).rejects.toThrow("fetch failed");

      expect(existsSync(path)).toBe(false);
      expect(existsSync(cleanup.sessionDir("alice"))).toBe(false);
    });

    it("keeps sessions in separate directories", async () => {
      await cleanup.withScope("alice", async (alice) => {
        await cleanup.withScope("bob", async (bob) => {
          expect(alice.directory).not.toBe(bob.directory);
          expect(dirname(alice.allocate("mp4"))).not.toBe(dirname(bob.allocate("mp4")));
        });
      });
    });
  });

  describe("ScratchScope", () => {
    it("discard deletes a path immediately and unregisters it", async () => {
      await cleanup.withScope("alice", async (scope) => {
        const path = scope.allocate("m4a");
        await writeFile(path, "raw");

        await scope.discard(path);

        expect(existsSync(path)).toBe(false);
        expect(() => scope.handOff(path)).toThrow(/not registered/);
      });
    });

    it("refuses to hand off an unregistered path", async () => {
      await cleanup.withScope("alice", async (scope) => {
        expect(() => scope.handOff(join(scope.directory, "elsewhere.mp4"))).toThrow(/not registered/);
      });
    });

    it("refuses to allocate after close", async () => {
      let closedScope: { allocate(ext: string): string } | undefined;
      await cleanup.withScope("alice", async (scope) => {
        closedScope = scope;
      });

      expect(() => closedScope?.allocate("mp4")).toThrow("Scratch scope is already closed");
    });
  });

  describe("purgeSession", () => {
    it("removes the session directory and leaves others", async () => {
      await mkdir(cleanup.sessionDir("alice"), { recursive: true });
      await mkdir(cleanup.sessionDir("bob"), { recursive: true });
      await writeFile(join(cleanup.sessionDir("alice"), "left.mp4"), "x");

      await cleanup.purgeSession("alice");

      expect(existsSync(cleanup.sessionDir("alice"))).toBe(false);
      expect(existsSync(cleanup.sessionDir("bob"))).toBe(true);
    });

    it("is a no-op for a session without scratch files", async () => {
      await expect(cleanup.purgeSession("nobody")).resolves.toBeUndefined();
    });
  });
});
