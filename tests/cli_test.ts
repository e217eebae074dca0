import { fileURLToPath } from "node:url";
import { afterEach, expect, test, vi } from "vitest";
import { cli } from "../src/cli.js";

const arith = fileURLToPath(new URL("../examples/arith.bl", import.meta.url));

afterEach(() => {
  process.exitCode = undefined;
  vi.restoreAllMocks();
});

test("cli run prints each top-level value", async () => {
  const out = vi.spyOn(console, "log").mockImplementation(() => {});
  await cli(["run", arith]);
  expect(out.mock.calls).toEqual([[5], [4], [6]]);
  expect(process.exitCode).toBeUndefined();
});

test("cli reports a missing file on one stderr line", async () => {
  const out = vi.spyOn(console, "log").mockImplementation(() => {});
  const errors = vi.spyOn(console, "error").mockImplementation(() => {});
  await cli(["does-not-exist.bl"]);
  expect(errors.mock.calls).toEqual([
    ["ENOENT: no such file or directory, open 'does-not-exist.bl'"],
  ]);
  expect(out).not.toHaveBeenCalled();
  expect(process.exitCode).toBe(1);
});

test("cli rejects a malformed define", async () => {
  const errors = vi.spyOn(console, "error").mockImplementation(() => {});
  await cli(["run", arith, "-D", "x=Infinity"]);
  expect(errors.mock.calls).toEqual([
    ["invalid define 'x=Infinity', expected name=number"],
  ]);
  expect(process.exitCode).toBe(1);
});
