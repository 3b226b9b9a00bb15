import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadPnmlFile } from "../src/load.js";
import { DuplicateIdError, XmlSyntaxError } from "../src/errors.js";

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "pnml-load-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadPnmlFile", () => {
  it("parses a document from disk", async () => {
    const file = join(dir, "ok.pnml");
    await writeFile(file, `<?xml version="1.0"?>\n<pnml><net><place id="p1"/><transition id="t1"/></net></pnml>`);

    const model = await loadPnmlFile(file);
    expect(model.places.size).toBe(1);
    expect(model.transitions.size).toBe(1);
  });

  it("fails on a duplicate place before returning a model", async () => {
    const file = join(dir, "dup.pnml");
    await writeFile(file, `<net><place id="p1"/><place id="p1"/></net>`);
    await expect(loadPnmlFile(file)).rejects.toThrow(DuplicateIdError);
  });

  it("surfaces malformed XML", async () => {
    const file = join(dir, "bad.pnml");
    await writeFile(file, `<net><place id="p1">`);
    await expect(loadPnmlFile(file)).rejects.toThrow(XmlSyntaxError);
  });

  it("propagates I/O errors", async () => {
    await expect(loadPnmlFile(join(dir, "missing.pnml"))).rejects.toMatchObject({ code: "ENOENT" });
  });
});
