import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { ConfigurationError } from "../lib/errors.js";
import { defaultScanRoots, resolveScanRoots } from "../lib/roots.js";

const TEST_DIR = path.join(os.tmpdir(), "osweep-roots-test");

describe("Roots Module", () => {
  describe("defaultScanRoots", () => {
    it("should use the AppData folders on Windows", () => {
      const roots = defaultScanRoots("win32", {
        APPDATA: "C:\\Users\\u\\AppData\\Roaming",
        LOCALAPPDATA: "C:\\Users\\u\\AppData\\Local",
      }, "C:\\Users\\u");
      expect(roots).toEqual([
        { path: "C:\\Users\\u\\AppData\\Roaming", label: "Roaming" },
        { path: "C:\\Users\\u\\AppData\\Local", label: "Local" },
      ]);
    });

    it("should use Library folders on macOS", () => {
      const roots = defaultScanRoots("darwin", {}, "/Users/u");
      expect(roots.map((r) => r.path)).toEqual([
        path.join("/Users/u", "Library", "Application Support"),
        path.join("/Users/u", "Library", "Caches"),
      ]);
    });

    it("should honor XDG variables elsewhere", () => {
      const roots = defaultScanRoots("linux", { XDG_CONFIG_HOME: "/cfg" }, "/home/u");
      expect(roots).toEqual([
        { path: "/cfg", label: "config" },
        { path: path.join("/home/u", ".local", "share"), label: "data" },
        { path: path.join("/home/u", ".cache"), label: "cache" },
      ]);
    });
  });

  describe("resolveScanRoots", () => {
    beforeEach(() => {
      if (fs.existsSync(TEST_DIR)) {
        fs.rmSync(TEST_DIR, { recursive: true });
      }
      fs.mkdirSync(path.join(TEST_DIR, "apps"), { recursive: true });
      fs.writeFileSync(path.join(TEST_DIR, "file.txt"), "not a folder");
    });

    afterEach(() => {
      if (fs.existsSync(TEST_DIR)) {
        fs.rmSync(TEST_DIR, { recursive: true });
      }
    });

    it("should keep existing folders and drop the rest", () => {
      const apps = path.join(TEST_DIR, "apps");
      const roots = resolveScanRoots([apps, path.join(TEST_DIR, "missing"), path.join(TEST_DIR, "file.txt"), apps]);
      expect(roots).toEqual([{ path: apps, label: "apps" }]);
    });

    it("should drop a root nested inside another one", () => {
      const apps = path.join(TEST_DIR, "apps");
      const share = path.join(apps, "share");
      fs.mkdirSync(share);
      expect(resolveScanRoots([share, apps])).toEqual([{ path: apps, label: "apps" }]);
      expect(resolveScanRoots([apps, `${apps}${path.sep}`, share])).toEqual([{ path: apps, label: "apps" }]);
    });

    it("should keep labels of structured roots", () => {
      const apps = path.join(TEST_DIR, "apps");
      expect(resolveScanRoots([{ path: apps, label: "Roaming" }])).toEqual([{ path: apps, label: "Roaming" }]);
    });

    it("should fail when no root is usable", () => {
      expect(() => resolveScanRoots([path.join(TEST_DIR, "missing")])).toThrow(ConfigurationError);
      expect(() => resolveScanRoots([])).toThrow("No valid scan roots. Tried: (none)");
    });
  });
});
