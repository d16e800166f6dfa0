import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { reapQuarantine } from "../src/quarantine-reaper.js";
import { createSandbox, day } from "./helpers.js";
import type { Sandbox } from "./helpers.js";

const TODAY = day("2018-03-10");

describe("reapQuarantine", () => {
  let sandbox: Sandbox;

  beforeEach(() => {
    sandbox = createSandbox();
    sandbox.tiers("daily", "quarantine");
  });

  afterEach(() => sandbox.cleanup());

  it("deletes entries quarantined at least 31 days ago", () => {
    sandbox.touch("quarantine", "2018-02-01_____x.tar", "2018-02-07_____y.tar", "2018-02-15_____z.tar", "undated.txt");

    const reaped = reapQuarantine(sandbox.context(TODAY));

    expect(reaped).toBe(2);
    expect(sandbox.list("quarantine")).toEqual(["2018-02-15_____z.tar", "undated.txt"]);
  });

  it("reports each deletion to the caller", () => {
    sandbox.touch("quarantine", "2018-02-01_____x.tar", "2018-02-07_____y.tar", "2018-02-15_____z.tar");
    const reported: string[] = [];

    reapQuarantine(sandbox.context(TODAY), (filename) => reported.push(filename));

    expect(reported.sort()).toEqual(["2018-02-01_____x.tar", "2018-02-07_____y.tar"]);
  });

  it("ages entries by the quarantine prefix, not the backup's own date", () => {
    sandbox.touch("quarantine", "2018-03-01_____2017-01-05_backup.tar");

    expect(reapQuarantine(sandbox.context(TODAY))).toBe(0);
    expect(sandbox.list("quarantine")).toEqual(["2018-03-01_____2017-01-05_backup.tar"]);
  });

  it("does not look at the other tiers", () => {
    sandbox.touch("daily", "2017-01-05_backup.tar");

    expect(reapQuarantine(sandbox.context(TODAY))).toBe(0);
    expect(sandbox.list("daily")).toEqual(["2017-01-05_backup.tar"]);
  });

  it("lets a deletion failure propagate", () => {
    const dir = join(sandbox.layout.quarantine, "2018-01-01_____dir");
    mkdirSync(dir);
    writeFileSync(join(dir, "inner.tar"), "backup");
    const ctx = sandbox.context(TODAY);

    expect(() => reapQuarantine(ctx)).toThrow();
    expect(sandbox.list("quarantine")).toEqual(["2018-01-01_____dir"]);
    expect(ctx.lines.some((l) => l.includes("|ERROR|"))).toBe(false);
  });

  it("returns 0 when there is no quarantine folder", () => {
    sandbox.cleanup();
    sandbox = createSandbox();

    expect(reapQuarantine(sandbox.context(TODAY))).toBe(0);
  });
});
