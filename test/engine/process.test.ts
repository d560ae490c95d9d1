import { describe, expect, it } from "vitest";
import { runProcess } from "../../src/engine/process.js";

describe("runProcess", () => {
  it("does not spawn once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(runProcess("engine-bin", ["submit"], { signal: controller.signal })).rejects.toMatchObject({
      code: "RUN_CANCELLED",
      message: 'Not starting "engine-bin": aborted',
    });
  });
});
