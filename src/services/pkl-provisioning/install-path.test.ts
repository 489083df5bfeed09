/**
 * Tests for install path helpers.
 */

import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { defaultInstallDir, pklBinaryName, resolveInstallPath } from "./install-path";
import { createMockPlatformInfo } from "../platform/platform-info.test-utils";

describe("pklBinaryName", () => {
  it("adds .exe on Windows only", () => {
    expect(pklBinaryName("win32")).toBe("pkl.exe");
    expect(pklBinaryName("linux")).toBe("pkl");
    expect(pklBinaryName("darwin")).toBe("pkl");
  });
});

describe("resolveInstallPath", () => {
  it("defaults to ~/.local/bin/pkl", () => {
    const platformInfo = createMockPlatformInfo({ homeDir: "/home/test" });

    expect(resolveInstallPath(null, platformInfo)).toBe(join("/home/test", ".local", "bin", "pkl"));
    expect(defaultInstallDir("/home/test")).toBe(join("/home/test", ".local", "bin"));
  });

  it("uses the configured directory", () => {
    const platformInfo = createMockPlatformInfo();

    expect(resolveInstallPath("/opt/tools", platformInfo)).toBe(join("/opt/tools", "pkl"));
  });

  it("names the binary pkl.exe on Windows", () => {
    const platformInfo = createMockPlatformInfo({ platform: "win32", homeDir: "/users/test" });

    expect(resolveInstallPath(null, platformInfo)).toBe(join("/users/test", ".local", "bin", "pkl.exe"));
  });
});
