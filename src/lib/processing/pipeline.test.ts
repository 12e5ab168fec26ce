import { describe, test, expect, vi } from "vitest";
import { andThen, degraded, failed, ok, unwrap } from "./pipeline.ts";
import type { StageResult } from "./pipeline.ts";
import { InputError } from "../utils/errors.ts";

const double = async (n: number): Promise<StageResult<number, string>> =>
  ok(n * 2);

describe("pipeline", () => {
  describe("andThen()", () => {
    test("runs the stage after ok", async () => {
      const result = await andThen(ok<number, string>(21), double);
      expect(result).toEqual({ kind: "ok", value: 42 });
    });

    test("skips the stage after degraded", async () => {
      const stage = vi.fn(double);
      const result = await andThen(
        degraded<number, string>("raw", "no decoder"),
        stage,
      );
      expect(stage).not.toHaveBeenCalled();
      expect(result).toEqual({
        kind: "degraded",
        fallback: "raw",
        reason: "no decoder",
      });
    });

    test("skips the stage after failed", async () => {
      const stage = vi.fn(double);
      const error = new InputError("Empty input.");
      const result = await andThen(failed<number, string>(error), stage);
      expect(stage).not.toHaveBeenCalled();
      expect(result).toEqual({ kind: "failed", error });
    });
  });

  describe("unwrap()", () => {
    test("returns ok values without reporting", () => {
      const onDegraded = vi.fn();
      expect(unwrap(ok("jpeg"), onDegraded)).toBe("jpeg");
      expect(onDegraded).not.toHaveBeenCalled();
    });

    test("returns the fallback and reports the reason", () => {
      const onDegraded = vi.fn();
      expect(unwrap(degraded<string, string>("raw", "encode failed"), onDegraded)).toBe(
        "raw",
      );
      expect(onDegraded).toHaveBeenCalledWith("encode failed");
    });

    test("throws the failure", () => {
      const error = new InputError("Empty input.");
      expect(() => unwrap(failed<string>(error), () => {})).toThrow(error);
    });
  });
});
