import { mkdtempSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { loadAutomergeConfig, parseAutomergeConfig } from "../src/config/automergeYaml.js";

describe(".automerge.yml", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "automerge-config-"));
  });

  it("missing file → defaults", () => {
    expect(loadAutomergeConfig(tmpDir)).toEqual({ labels: ["automerge", "priority"], onlyWhenBlocked: true });
  });

  it("reads labels and onlyWhenBlocked from the file", () => {
    writeFileSync(join(tmpDir, ".automerge.yml"), "labels:\n  - ship-it\n  - ' urgent '\nonlyWhenBlocked: false\n", "utf8");
    expect(loadAutomergeConfig(tmpDir)).toEqual({ labels: ["ship-it", "urgent"], onlyWhenBlocked: false });
  });

  it("empty document → defaults", () => {
    expect(parseAutomergeConfig("")).toEqual({ labels: ["automerge", "priority"], onlyWhenBlocked: true });
  });

  it("unknown key → throws", () => {
    expect(() => parseAutomergeConfig("labels: [a]\ncomment: true\n")).toThrow(
      '.automerge.yml: unknown key "comment" (v1 schema is frozen)',
    );
  });

  it("root that is not a mapping → throws", () => {
    expect(() => parseAutomergeConfig("- automerge\n")).toThrow(".automerge.yml: root must be an object");
  });

  it("empty or non-string labels → throws", () => {
    expect(() => parseAutomergeConfig("labels: []\n")).toThrow(
      ".automerge.yml: labels must be a non-empty array of label names",
    );
    expect(() => parseAutomergeConfig("labels: [automerge, 3]\n")).toThrow(
      ".automerge.yml: labels[1] must be a non-empty string",
    );
  });

  it("non-boolean onlyWhenBlocked → throws", () => {
    expect(() => parseAutomergeConfig("onlyWhenBlocked: sometimes\n")).toThrow(
      ".automerge.yml: onlyWhenBlocked must be true or false",
    );
  });

  it("invalid YAML → throws with the file name", () => {
    expect(() => parseAutomergeConfig("labels: [unclosed\n")).toThrow(/^\.automerge\.yml: invalid YAML: /);
  });
});
