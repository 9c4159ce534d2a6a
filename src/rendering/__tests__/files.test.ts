import { mkdir, mkdtemp, readdir, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { BlockError } from "../../util/errors";
import { sanitizeFilename, withExtension, writeFileAtomic } from "../files";

describe("writeFileAtomic", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "atomic-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates missing directories and leaves only the target", async () => {
    const target = path.join(dir, "nested", "out.md");

    await writeFileAtomic(target, "# hello\n");

    expect(await readFile(target, "utf8")).toBe("# hello\n");
    expect(await readdir(path.join(dir, "nested"))).toEqual(["out.md"]);
  });

  it("removes the temp file when the rename fails", async () => {
    const target = path.join(dir, "out.md");
    await mkdir(path.join(target, "child"), { recursive: true });

    let caught: unknown;
    try {
      await writeFileAtomic(target, "content");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(BlockError);
    if (!(caught instanceof BlockError)) return;
    expect(caught.kind).toBe("io");
    expect(caught.message.startsWith(`Failed to write ${target}`)).toBe(true);
    expect(await readdir(dir)).toEqual(["out.md"]);
  });
});

describe("file name helpers", () => {
  it("replaces unsafe characters", () => {
    expect(sanitizeFilename(" a/b:c d ")).toBe("a_b_c_d");
  });

  it("appends an extension only when missing", () => {
    expect(withExtension("report", ".md")).toBe("report.md");
    expect(withExtension("report.MD", ".md")).toBe("report.MD");
  });
});
