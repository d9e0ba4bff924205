import { describe, it, expect } from "vitest";
import { parseIni, IniSyntaxError } from "./ini.js";

describe("parseIni", () => {
  it("parses sections and trimmed key/value pairs in order", () => {
    const sections = parseIni(
      ["[fedora]", "name = Fedora $releasever", "enabled=1", "", "[updates]", "enabled = 0"].join("\n"),
    );
    expect(sections.map((s) => s.name)).toEqual(["fedora", "updates"]);
    expect(sections[0]?.values.get("name")).toBe("Fedora $releasever");
    expect(sections[0]?.values.get("enabled")).toBe("1");
    expect(sections[1]?.values.get("enabled")).toBe("0");
  });

  it("skips comments and keeps # inside values", () => {
    const sections = parseIni(
      "# header\n; another\n[a]\nmetalink=https://mirrors.example.test/m?repo=a#frag\n",
    );
    expect(sections[0]?.values.get("metalink")).toBe("https://mirrors.example.test/m?repo=a#frag");
  });

  it("joins indented continuation lines with newlines", () => {
    const sections = parseIni(
      "[a]\ngpgkey=file:///etc/pki/one\n  file:///etc/pki/two\nenabled=1\n",
    );
    expect(sections[0]?.values.get("gpgkey")).toBe("file:///etc/pki/one\nfile:///etc/pki/two");
    expect(sections[0]?.values.get("enabled")).toBe("1");
  });

  it("accepts CRLF line endings", () => {
    const sections = parseIni("[a]\r\ncountme=1\r\n");
    expect(sections[0]?.values.get("countme")).toBe("1");
  });

  it("lets a repeated key overwrite the earlier value", () => {
    const sections = parseIni("[a]\nenabled=0\nenabled=1\n");
    expect(sections[0]?.values.get("enabled")).toBe("1");
  });

  it("keeps empty values", () => {
    const sections = parseIni("[a]\nmetalink=\n");
    expect(sections[0]?.values.get("metalink")).toBe("");
  });

  it("returns no sections for an empty file", () => {
    expect(parseIni("")).toEqual([]);
  });

  it("rejects keys before the first section", () => {
    expect(() => parseIni("enabled=1\n[a]\n")).toThrow('line 1: key "enabled" outside of any section');
  });

  it("rejects empty section names", () => {
    expect(() => parseIni("[a]\n[ ]\n")).toThrow(IniSyntaxError);
  });

  it("reports the line of an unparseable line", () => {
    try {
      parseIni("[a]\nenabled=1\nnot a pair\n");
      expect.fail("expected a syntax error");
    } catch (err) {
      if (!(err instanceof IniSyntaxError)) throw err;
      expect(err.line).toBe(3);
      expect(err.message).toBe('line 3: unparseable line "not a pair"');
    }
  });
});
