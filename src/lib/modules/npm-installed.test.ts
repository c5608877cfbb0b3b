import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { installed, npmInstalledModule } from "./npm-installed.js";
import { CommandExecutionError, CommandNotFoundError } from "../errors.js";
import type { InstalledPackages, InstallOutcome, PackageManager, StateContext } from "../types.js";

function mockPackageManager(
  listed: InstalledPackages = {},
  outcome: InstallOutcome = { kind: "success", packages: [{ name: "coffee-script", version: "1.0.1" }] }
) {
  return {
    list: vi.fn<PackageManager["list"]>().mockResolvedValue(listed),
    install: vi.fn<PackageManager["install"]>().mockResolvedValue(outcome),
    uninstall: vi.fn<PackageManager["uninstall"]>().mockResolvedValue(true),
  };
}

function context(packageManager: PackageManager, dryRun = false): StateContext {
  return { packageManager, dryRun };
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("installed", () => {
  it("is satisfied when the exact version is installed", async () => {
    const pm = mockPackageManager({ "coffee-script": { version: "1.0.1" } });

    const result = await installed(
      { name: "coffee-script", pkgs: ["coffee-script@1.0.1"] },
      context(pm)
    );

    expect(result).toEqual({
      name: "coffee-script",
      result: true,
      comment: "Package(s) 'coffee-script@1.0.1' satisfied by coffee-script@1.0.1",
      changes: {},
    });
    expect(pm.install).not.toHaveBeenCalled();
  });

  it("is satisfied by any installed version when none is requested", async () => {
    const pm = mockPackageManager({ grunt: { version: "1.6.1" } });

    const result = await installed({ name: "grunt" }, context(pm));

    expect(result.result).toBe(true);
    expect(result.comment).toBe("Package(s) 'grunt' satisfied by grunt@1.6.1");
    expect(result.changes).toEqual({});
    expect(pm.install).not.toHaveBeenCalled();
  });

  it("compares names case-insensitively", async () => {
    const pm = mockPackageManager({ JSONStream: { version: "1.3.5" } });

    const result = await installed({ name: "jsonstream@1.3.5" }, context(pm));

    expect(result.result).toBe(true);
    expect(result.comment).toBe("Package(s) 'jsonstream@1.3.5' satisfied by jsonstream@1.3.5");
  });

  it("installs the package list when the installed version differs", async () => {
    const pm = mockPackageManager({ "coffee-script": { version: "1.0.0" } });

    const result = await installed(
      { name: "coffee-script", pkgs: ["coffee-script@1.0.1"], dir: "/srv/app", user: "deploy" },
      context(pm)
    );

    expect(pm.install).toHaveBeenCalledWith({
      dir: "/srv/app",
      user: "deploy",
      registry: undefined,
      env: undefined,
      pkgs: ["coffee-script@1.0.1"],
    });
    expect(result).toEqual({
      name: "coffee-script",
      result: true,
      comment: "Package(s) 'coffee-script@1.0.1' successfully installed",
      changes: { old: [], new: ["coffee-script@1.0.1"] },
    });
  });

  it("installs missing packages regardless of version", async () => {
    const pm = mockPackageManager({ grunt: { version: "1.6.1" } });

    const result = await installed(
      { name: "tools", pkgs: ["grunt", "bower@1.8.14", "less"] },
      context(pm)
    );

    expect(result.changes).toEqual({ old: [], new: ["bower@1.8.14", "less"] });
    expect(pm.install.mock.calls[0][0].pkgs).toEqual(["grunt", "bower@1.8.14", "less"]);
  });

  it("passes the version-stripped, lower-cased name on the single-package path", async () => {
    const pm = mockPackageManager({ "coffee-script": { version: "1.0.0" } });

    const result = await installed({ name: "Coffee-Script@1.0.1" }, context(pm));

    // The install call drops the requested version; only the reported change keeps it.
    expect(pm.install).toHaveBeenCalledWith({
      dir: undefined,
      user: undefined,
      registry: undefined,
      env: undefined,
      pkg: "coffee-script",
    });
    expect(result.changes).toEqual({ old: [], new: ["Coffee-Script@1.0.1"] });
  });

  it("installs packages named after Object.prototype members", async () => {
    const pm = mockPackageManager({});

    const result = await installed({ name: "constructor" }, context(pm));

    expect(pm.install).toHaveBeenCalledWith({
      dir: undefined,
      user: undefined,
      registry: undefined,
      env: undefined,
      pkg: "constructor",
    });
    expect(result.result).toBe(true);
    expect(result.changes).toEqual({ old: [], new: ["constructor"] });
  });

  it("reports hasOwnProperty as missing against an empty listing in dry run", async () => {
    const pm = mockPackageManager({});

    const result = await installed({ name: "tools", pkgs: ["hasOwnProperty", "toString@1.0.0"] }, context(pm, true));

    expect(result.changes).toEqual({ old: [], new: ["hasOwnProperty", "toString@1.0.0"] });
    expect(result.comment).toBe("NPM package(s) 'hasOwnProperty, toString@1.0.0' are set to be installed");
  });

  it("compares the version verbatim, including trailing whitespace", async () => {
    const pm = mockPackageManager({ grunt: { version: "1.0.1" } });

    const result = await installed({ name: "tools", pkgs: ["grunt@1.0.1 "] }, context(pm));

    expect(pm.install).toHaveBeenCalledTimes(1);
    expect(result.changes).toEqual({ old: [], new: ["grunt@1.0.1 "] });
  });

  it("reinstalls satisfied packages when forced", async () => {
    const pm = mockPackageManager({ "coffee-script": { version: "1.0.1" } });

    const result = await installed(
      { name: "coffee-script", pkgs: ["coffee-script@1.0.1"], forceReinstall: true },
      context(pm)
    );

    expect(pm.install).toHaveBeenCalledTimes(1);
    expect(result.result).toBe(true);
    expect(result.changes).toEqual({ old: [], new: ["coffee-script@1.0.1"] });
  });

  it("forwards dir, user and env to the listing and registry to the install", async () => {
    const pm = mockPackageManager({});
    const env = [{ NPM_CONFIG_CACHE: "/tmp/cache" }];

    await installed(
      { name: "grunt", dir: "/srv/app", user: "deploy", env, registry: "http://localhost:4873" },
      context(pm)
    );

    expect(pm.list).toHaveBeenCalledWith({ dir: "/srv/app", user: "deploy", env });
    expect(pm.install).toHaveBeenCalledWith({
      dir: "/srv/app",
      user: "deploy",
      registry: "http://localhost:4873",
      env,
      pkg: "grunt",
    });
  });

  it("reports listing failures as a failed result", async () => {
    const pm = mockPackageManager();
    pm.list.mockRejectedValue(new CommandNotFoundError("npm: command not found"));

    const result = await installed({ name: "grunt" }, context(pm));

    expect(result).toEqual({
      name: "grunt",
      result: false,
      comment: "Error looking up 'grunt': npm: command not found",
      changes: {},
    });
    expect(pm.install).not.toHaveBeenCalled();
  });

  it("reports install failures with the error text", async () => {
    const pm = mockPackageManager({});
    pm.install.mockRejectedValue(new CommandExecutionError("npm ERR! 404 Not Found", 1));

    const result = await installed({ name: "grunt", pkgs: ["grunt", "bower"] }, context(pm));

    expect(result.result).toBe(false);
    expect(result.comment).toBe("Error installing 'grunt, bower': npm ERR! 404 Not Found");
    expect(result.changes).toEqual({});
  });

  it("fails when the install reports no packages", async () => {
    const pm = mockPackageManager({}, { kind: "success", packages: [] });

    const result = await installed({ name: "grunt" }, context(pm));

    expect(result.result).toBe(false);
    expect(result.comment).toBe("Could not install package(s) 'grunt'");
  });

  it("fails when the install output cannot be parsed", async () => {
    const pm = mockPackageManager({}, { kind: "parse-failure", raw: "npm WARN something" });

    const result = await installed({ name: "grunt" }, context(pm));

    expect(result.result).toBe(false);
    expect(result.comment).toBe("Could not install package(s) 'grunt'");
  });

  it("propagates errors that are not capability failures", async () => {
    const pm = mockPackageManager();
    pm.list.mockRejectedValue(new TypeError("unexpected"));

    await expect(installed({ name: "grunt" }, context(pm))).rejects.toThrow("unexpected");
  });
});

describe("installed (dry run)", () => {
  it("reports pending installs without installing", async () => {
    const pm = mockPackageManager({ grunt: { version: "1.6.1" } });

    const result = await installed({ name: "tools", pkgs: ["grunt", "bower"] }, context(pm, true));

    expect(result).toEqual({
      name: "tools",
      result: null,
      comment: "NPM package(s) 'bower' are set to be installed. Package(s) 'grunt, bower' satisfied by grunt@1.6.1",
      changes: { old: [], new: ["bower"] },
    });
    expect(pm.install).not.toHaveBeenCalled();
  });

  it("reports null even when everything is satisfied", async () => {
    const pm = mockPackageManager({ grunt: { version: "1.6.1" } });

    const result = await installed({ name: "grunt" }, context(pm, true));

    expect(result.result).toBeNull();
    expect(result.changes).toEqual({});
    expect(result.comment).toBe("Package(s) 'grunt' satisfied by grunt@1.6.1");
  });
});

describe("npmInstalledModule", () => {
  it("is registered under npm.installed", () => {
    expect(npmInstalledModule.name).toBe("npm.installed");
    expect(npmInstalledModule.run).toBe(installed);
  });
});
