import { describe, expect, it } from "vitest";
import { ArgumentIndexError } from "../errors.js";
import { ArgumentList, renderNatural, toFormatArg } from "./format-arg.js";

describe("toFormatArg", () => {
  it("classifies primitives", () => {
    expect(toFormatArg("hi")).toEqual({ kind: "text", value: "hi" });
    expect(toFormatArg(42)).toEqual({ kind: "integer", value: 42 });
    expect(toFormatArg(1.5)).toEqual({ kind: "float", value: 1.5 });
    expect(toFormatArg(NaN)).toEqual({ kind: "float", value: NaN });
    expect(toFormatArg(7n)).toEqual({ kind: "bigint", value: 7n });
    expect(toFormatArg(false)).toEqual({ kind: "boolean", value: false });
    expect(toFormatArg(null)).toEqual({ kind: "nullish", value: null });
    expect(toFormatArg(undefined)).toEqual({ kind: "nullish", value: undefined });
  });

  it("classifies functions by name", () => {
    function relay(): void {}
    expect(toFormatArg(relay)).toEqual({ kind: "function", name: "relay" });
  });

  it("classifies errors and dates before plain objects", () => {
    expect(toFormatArg(new TypeError("bad")).kind).toBe("error");
    expect(toFormatArg(new Date(0)).kind).toBe("date");
    expect(toFormatArg({ a: 1 }).kind).toBe("object");
    expect(toFormatArg([1, 2]).kind).toBe("object");
  });
});

describe("renderNatural", () => {
  const render = (value: unknown) => renderNatural(toFormatArg(value));

  it("renders numbers in decimal", () => {
    expect(render(255)).toBe("255");
    expect(render(-12)).toBe("-12");
    expect(render(0.25)).toBe("0.25");
    expect(render(123456789012345678901234567890n)).toBe("123456789012345678901234567890");
  });

  it("renders text, booleans and nullish values", () => {
    expect(render("alice")).toBe("alice");
    expect(render(true)).toBe("true");
    expect(render(null)).toBe("null");
    expect(render(undefined)).toBe("undefined");
  });

  it("renders symbols and functions", () => {
    expect(render(Symbol("conn"))).toBe("Symbol(conn)");
    expect(render(function handshake() {})).toBe("[Function handshake]");
    expect(renderNatural({ kind: "function", name: "" })).toBe("[Function anonymous]");
  });

  it("renders errors as name and message", () => {
    expect(render(new RangeError("too far"))).toBe("RangeError: too far");
    expect(render(new Error(""))).toBe("Error");
  });

  it("renders dates as ISO-8601", () => {
    expect(render(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe("2024-01-02T03:04:05.000Z");
    expect(render(new Date(Number.NaN))).toBe("Invalid Date");
  });

  it("renders objects as JSON", () => {
    expect(render({ host: "127.0.0.1", port: 8388 })).toBe('{"host":"127.0.0.1","port":8388}');
  });

  it("repeats a shared object instead of calling it circular", () => {
    const peer = { host: "10.0.0.7" };
    expect(render({ from: peer, to: peer })).toBe(
      '{"from":{"host":"10.0.0.7"},"to":{"host":"10.0.0.7"}}',
    );
  });
});

describe("ArgumentList", () => {
  it("exposes arity and positional access", () => {
    const list = new ArgumentList(["a", 1, true]);
    expect(list.length).toBe(3);
    expect(list.at(0)).toEqual({ kind: "text", value: "a" });
    expect(list.at(2)).toEqual({ kind: "boolean", value: true });
  });

  it("visit applies the operation to the indexed argument", () => {
    const list = new ArgumentList(["a", 1]);
    expect(list.visit(1, (arg) => arg.kind)).toBe("integer");
    expect(list.visit(0, renderNatural)).toBe("a");
  });

  it("throws ArgumentIndexError outside the bounds", () => {
    const list = new ArgumentList(["a"]);
    expect(() => list.at(1)).toThrow(ArgumentIndexError);
    expect(() => list.at(-1)).toThrow(ArgumentIndexError);
    expect(() => list.at(0.5)).toThrow(ArgumentIndexError);
    expect(() => new ArgumentList([]).visit(0, renderNatural)).toThrow(
      "Argument index 0 out of range (argument count: 0)",
    );
  });
});
