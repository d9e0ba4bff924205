import { describe, it, expect } from "vitest";
import { buildUserAgent, toBaseArch } from "./user-agent.js";

describe("toBaseArch", () => {
  it("maps Node.js architectures to basearch names", () => {
    expect(toBaseArch("x64")).toBe("x86_64");
    expect(toBaseArch("arm64")).toBe("aarch64");
    expect(toBaseArch("ppc64")).toBe("ppc64le");
  });

  it("passes through names that already match", () => {
    expect(toBaseArch("s390x")).toBe("s390x");
    expect(toBaseArch("riscv64")).toBe("riscv64");
  });
});

describe("buildUserAgent", () => {
  it("encodes name, version, variant and architecture", () => {
    expect(
      buildUserAgent("countme", { name: "Fedora Linux", versionId: "39", variantId: "coreos" }, "x86_64"),
    ).toBe("countme (Fedora Linux 39; coreos; Linux.x86_64)");
  });

  it("uses the default variant when none is set", () => {
    expect(buildUserAgent("countme", { name: "Fedora Linux", versionId: "40" }, "aarch64")).toBe(
      "countme (Fedora Linux 40; unknown; Linux.aarch64)",
    );
  });
});
