import { describe, expect, it } from "vitest";
import { Err, Ok, Result } from "../src";

describe("Result", () => {
  it("maps Ok values and skips Err", () => {
    expect(Ok<number, string>(2).map((v) => v * 3).value).toBe(6);
    expect(Err<number, string>("bad").map((v) => v * 3).error).toBe("bad");
  });

  it("chains with flatMap", () => {
    const half = (v: number): Result<number, string> =>
      v % 2 === 0 ? Ok(v / 2) : Err("odd");
    expect(Ok<number, string>(8).flatMap(half).flatMap(half).value).toBe(2);
    expect(Ok<number, string>(6).flatMap(half).flatMap(half).error).toBe("odd");
  });

  it("captures thrown errors with fromThrowable", () => {
    const result = Result.fromThrowable(
      () => {
        throw new Error("boom");
      },
      (e) => (e instanceof Error ? e.message : "unknown"),
    );
    expect(result.isErr()).toBe(true);
    expect(result.error).toBe("boom");
  });

  it("matches both branches", () => {
    expect(Ok(1).match((v) => `ok:${v}`, () => "err")).toBe("ok:1");
    expect(Err("x").match(() => "ok", (e) => `err:${e}`)).toBe("err:x");
  });

  it("throws the carried error from getOrThrow", () => {
    const error = new Error("carried");
    expect(() => Err(error).getOrThrow()).toThrow(error);
    expect(Err<number, Error>(error).getOrElse(5)).toBe(5);
  });

  it("refuses to read the wrong side", () => {
    expect(() => Ok(1).error).toThrow("Cannot access error of Ok Result");
    expect(() => Err("e").value).toThrow("Cannot access value of Err Result");
  });

  it("runs tap only on Ok and tapErr only on Err", () => {
    const seen: string[] = [];
    Ok("a")
      .tap((v) => seen.push(`tap:${v}`))
      .tapErr(() => seen.push("never"));
    Err("b")
      .tap(() => seen.push("never"))
      .tapErr((e) => seen.push(`tapErr:${e}`));
    expect(seen).toEqual(["tap:a", "tapErr:b"]);
  });
});
