import { afterAll, afterEach, beforeAll, beforeEach, describe, it, expect, vi } from "vitest";
import type { MockInstance } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { USAGE, run } from "../src/run.js";

let dir: string;
let log: MockInstance<typeof console.log>;
let error: MockInstance<typeof console.error>;

async function fixture(name: string, xml: string): Promise<string> {
  const file = join(dir, name);
  await writeFile(file, xml);
  return file;
}

function stdout(): string {
  return log.mock.calls.map((c) => c.join(" ")).join("\n");
}

function stderr(): string {
  return error.mock.calls.map((c) => c.join(" ")).join("\n");
}

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "pnml-cli-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

beforeEach(() => {
  log = vi.spyOn(console, "log").mockImplementation(() => {});
  error = vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("run", () => {
  it("prints usage and fails without a file", async () => {
    expect(await run([])).toBe(1);
    expect(stderr()).toBe(USAGE);
    expect(log).not.toHaveBeenCalled();
  });

  it("fails with more than one file", async () => {
    expect(await run(["a.pnml", "b.pnml"])).toBe(1);
    expect(stderr()).toBe(USAGE);
  });

  it("prints usage on --help", async () => {
    expect(await run(["--help"])).toBe(0);
    expect(stdout()).toBe(USAGE);
  });

  it("rejects unknown options", async () => {
    expect(await run(["--dot", "x.pnml"])).toBe(1);
    expect(error.mock.calls[0]).toEqual(["Unknown option: --dot"]);
  });

  it("prints the summary and exits 0 even with findings", async () => {
    const file = await fixture(
      "dangling.pnml",
      `<net><arc id="a1" source="p1" target="t1"/></net>`,
    );

    expect(await run([file])).toBe(0);
    expect(stdout()).toContain("Errors:\n  Arc a1 has unknown source p1\n  Arc a1 has unknown target t1");
  });

  it("exits 1 under --strict when there are structural errors", async () => {
    const file = await fixture(
      "strict.pnml",
      `<net><arc id="a1" source="p1" target="t1"/></net>`,
    );

    expect(await run([file, "--strict"])).toBe(1);
    expect(stderr()).toBe("\nSTRICT: 2 structural error(s)");
  });

  it("ignores warnings under --strict", async () => {
    const file = await fixture(
      "warn.pnml",
      `<net><place id="p1"><initialMarking><text>4</text></initialMarking></place></net>`,
    );
    expect(await run(["--strict", file])).toBe(0);
  });

  it("prints JSON with --json", async () => {
    const file = await fixture("json.pnml", `<net><place id="p1"/></net>`);

    expect(await run([file, "--json"])).toBe(0);
    expect(JSON.parse(stdout())).toEqual({
      counts: { places: 1, transitions: 0, arcs: 0 },
      markedPlaces: [],
      errors: [],
      warnings: [],
    });
  });

  it("prints nothing on stdout when the parse fails", async () => {
    const file = await fixture("dup.pnml", `<net><place id="p1"/><place id="p1"/></net>`);

    expect(await run([file])).toBe(1);
    expect(log).not.toHaveBeenCalled();
    expect(stderr()).toBe("Error: Duplicate place id: p1");
  });

  it("reports a missing file", async () => {
    const file = join(dir, "missing.pnml");
    expect(await run([file])).toBe(1);
    expect(stderr()).toMatch(/^Error reading .*missing\.pnml: ENOENT/);
  });
});
