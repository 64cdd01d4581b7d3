import { describe, expect, test } from "vitest";
import { pathToFileURL } from "node:url";
import { MemoryFileSystem } from "../memory.js";
import { MultiRootFileSystem } from "../multi-root.js";

const R1 = new URL("file:///build/gen/");
const R2 = new URL("file:///build/src/");

function overlay(files: Record<string, string>) {
  const delegate = new MemoryFileSystem(files);
  return { delegate, fs: new MultiRootFileSystem("multi-root", [R1, R2], delegate) };
}

describe("MultiRootFileSystem", () => {
  test("resolves to the first root holding the path", async () => {
    const { fs } = overlay({
      "file:///build/gen/lib/a.mod": "gen",
      "file:///build/src/lib/a.mod": "src",
    });
    const uri = new URL("multi-root:///lib/a.mod");

    expect((await fs.resolve(uri)).href).toBe("file:///build/gen/lib/a.mod");
    expect(new TextDecoder().decode(await fs.readBytes(uri))).toBe("gen");
  });

  test("falls through to a later root", async () => {
    const { fs } = overlay({ "file:///build/src/lib/a.mod": "src" });
    const uri = new URL("multi-root:///lib/a.mod");

    expect((await fs.resolve(uri)).href).toBe("file:///build/src/lib/a.mod");
    expect(await fs.exists(uri)).toBe(true);
  });

  test("path under no root resolves to the first root and fails to read", async () => {
    const { fs } = overlay({});
    const uri = new URL("multi-root:///lib/missing.mod");

    expect((await fs.resolve(uri)).href).toBe("file:///build/gen/lib/missing.mod");
    expect(await fs.exists(uri)).toBe(false);
    await expect(fs.readBytes(uri)).rejects.toThrow(
      "File not found: file:///build/gen/lib/missing.mod",
    );
  });

  test("other schemes pass through to the delegate", async () => {
    const { fs, delegate } = overlay({ "file:///elsewhere/x.mod": "x" });

    expect(fs.owns(new URL("file:///elsewhere/x.mod"))).toBe(false);
    expect(new TextDecoder().decode(await fs.readBytes(new URL("file:///elsewhere/x.mod")))).toBe("x");
    expect(delegate.reads).toBe(1);
  });

  test("roots without a trailing slash are treated as directories", () => {
    const fs = new MultiRootFileSystem(
      "multi-root",
      [new URL("file:///build/gen")],
      new MemoryFileSystem(),
    );
    expect(fs.roots.map((root) => root.href)).toEqual(["file:///build/gen/"]);
  });

  test("no roots means the working directory", () => {
    const fs = new MultiRootFileSystem("multi-root", [], new MemoryFileSystem(), "/work/space");
    expect(fs.roots.map((root) => root.href)).toEqual([`${pathToFileURL("/work/space").href}/`]);
  });

  test("custom scheme", async () => {
    const delegate = new MemoryFileSystem({ "file:///build/gen/a.mod": "a" });
    const fs = new MultiRootFileSystem("workspace", [R1], delegate);

    expect(fs.owns(new URL("workspace:///a.mod"))).toBe(true);
    expect(fs.owns(new URL("multi-root:///a.mod"))).toBe(false);
    expect(await fs.exists(new URL("workspace:///a.mod"))).toBe(true);
  });
});
