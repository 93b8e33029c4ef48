import { describe, it, expect } from "vitest";
import {
  validateDirectoryPath,
  validateEntryName,
  validateFilePath,
  validateSecret,
} from "./path-validation";

describe("path-validation", () => {
  it("accepts nested file paths", () => {
    expect(validateFilePath("archive/site.org")).toEqual({ ok: true, value: "archive/site.org" });
  });

  it("rejects file paths with leading or trailing separators", () => {
    expect(validateFilePath("/abs")).toEqual({ ok: false, message: "Path cannot start or end with a /" });
    expect(validateFilePath("dir/")).toEqual({ ok: false, message: "Path cannot start or end with a /" });
  });

  it("rejects an empty file path", () => {
    expect(validateFilePath("")).toEqual({ ok: false, message: "Path cannot be empty" });
  });

  it("allows an empty or trailing-slash directory but not an absolute one", () => {
    expect(validateDirectoryPath("").ok).toBe(true);
    expect(validateDirectoryPath("work/").ok).toBe(true);
    expect(validateDirectoryPath("/work")).toEqual({ ok: false, message: "Path cannot start with a /" });
  });

  it("rejects parent segments", () => {
    expect(validateDirectoryPath("work/../..")).toEqual({ ok: false, message: "Path cannot contain .." });
  });

  it("keeps entry names to a single segment", () => {
    expect(validateEntryName("mail.com").ok).toBe(true);
    expect(validateEntryName("a/b")).toEqual({ ok: false, message: "Name cannot contain a /" });
    expect(validateEntryName("")).toEqual({ ok: false, message: "Name cannot be empty" });
  });

  it("requires a secret", () => {
    expect(validateSecret("")).toEqual({ ok: false, message: "The password field cannot be empty" });
  });
});
