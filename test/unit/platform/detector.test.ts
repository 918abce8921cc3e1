import { parseOsRelease, resolveFamily, detectPlatform } from "../../../src/platform/detector.js";

describe("parseOsRelease", () => {
  it("parses quoted and unquoted values", () => {
    const content = 'NAME="Rocky Linux"\nVERSION_ID="9.3"\nID=rocky\n# comment\n\n';
    expect(parseOsRelease(content)).toEqual({ NAME: "Rocky Linux", VERSION_ID: "9.3", ID: "rocky" });
  });
});

describe("resolveFamily", () => {
  it("maps node platform identifiers to rule families", () => {
    expect(resolveFamily("linux")).toBe("linux");
    expect(resolveFamily("sunos")).toBe("solaris");
    expect(resolveFamily("freebsd")).toBe("freebsd");
    expect(resolveFamily("darwin")).toBe("darwin");
    expect(resolveFamily("win32")).toBe("unknown");
  });
});

describe("detectPlatform", () => {
  it("applies every override field", () => {
    const overrides = { family: "solaris" as const, name: "solaris", version: "11.4", mac_system: "none" as const };
    expect(detectPlatform(overrides)).toEqual(overrides);
  });
});
