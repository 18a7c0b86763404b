import { afterEach, describe, expect, it } from "vitest";
import { definePlugin } from "../../src/plugin.ts";
import { createFixture, type LabFixture } from "./helpers.ts";

let fixture: LabFixture | undefined;

afterEach(() => {
  fixture?.cleanup();
  fixture = undefined;
});

describe("plugins", () => {
  it("receive lifecycle hooks from the workflows", async () => {
    const events: string[] = [];
    const plugin = definePlugin({
      name: "recorder",
      setup(ctx) {
        ctx.hooks.hook("network:ready", (result) => {
          events.push(`network:${result.action}`);
        });
        ctx.hooks.hook("vm:registered", ({ vmName }) => {
          events.push(`registered:${vmName}`);
        });
      },
    });
    fixture = await createFixture({ plugins: [plugin] });

    await fixture.lab.create();

    expect(events).toEqual(["network:created", "registered:FedoraLab1", "registered:FedoraLab2"]);
  });

  it("see workflow failures before they propagate", async () => {
    const failures: string[] = [];
    const plugin = definePlugin({
      name: "errors",
      setup(ctx) {
        ctx.hooks.hook("workflow:error", ({ workflow, error }) => {
          failures.push(`${workflow}: ${error.message}`);
        });
      },
    });
    fixture = await createFixture({ plugins: [plugin], withSourceImage: false });

    await expect(fixture.lab.create()).rejects.toMatchObject({ code: "ERR_IMAGE_SOURCE_NOT_FOUND" });
    expect(failures).toEqual([`create: Source base image not found: ${fixture.sourceImage}`]);
  });

  it("cannot break a workflow by throwing from a hook", async () => {
    const plugin = definePlugin({
      name: "broken",
      setup(ctx) {
        ctx.hooks.hook("vm:registered", () => {
          throw new Error("boom");
        });
      },
    });
    fixture = await createFixture({ plugins: [plugin] });

    const report = await fixture.lab.create();

    expect(report.vms.map((t) => t.state)).toEqual(["shut-off", "shut-off"]);
    expect(
      fixture.logger.records.filter((r) => r.level === "warn" && r.message === "Hook vm:registered failed: boom"),
    ).toHaveLength(2);
  });
});
