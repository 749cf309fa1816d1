import { describe, expect, it } from "vitest";
import * as root from "./index";
import * as core from "./core-entry";
import * as flight from "./singleflight-entry";

describe("root named exports", () => {
  it("re-exports every runtime value of the granular entry points", () => {
    for (const name of [...Object.keys(core), ...Object.keys(flight)]) {
      expect(Object.keys(root)).toContain(name);
    }
  });

  it("exposes the group factory and Result constructors together", async () => {
    const group = root.createSingleflightGroup<string, number>();

    await expect(group.do("key", () => root.ok(1))).resolves.toEqual({ ok: true, value: 1, shared: false });
    expect(root.err("E")).toEqual(core.err("E"));
  });
});
