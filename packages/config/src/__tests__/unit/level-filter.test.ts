import { LevelFilterParseError } from "@telex/errors";
import { describe, expect, it } from "vitest";
import { LevelFilter } from "../../level-filter.js";

describe("LevelFilter.parse", () => {
  it("should parse a default level", () => {
    const filter = LevelFilter.parse("warn");

    expect(filter.enabled("warn", "app")).toBe(true);
    expect(filter.enabled("error", "app")).toBe(true);
    expect(filter.enabled("info", "app")).toBe(false);
  });

  it("should apply module overrides by longest prefix", () => {
    const filter = LevelFilter.parse("info, grpc=off, grpc.channel=debug");

    expect(filter.enabled("info", "app.server")).toBe(true);
    expect(filter.enabled("error", "grpc.server")).toBe(false);
    expect(filter.enabled("debug", "grpc.channel.pool")).toBe(true);
    expect(filter.enabled("trace", "grpc.channel.pool")).toBe(false);
  });

  it("should treat a bare module as enabling every severity for it", () => {
    const filter = LevelFilter.parse("error,db");

    expect(filter.enabled("trace", "db.pool")).toBe(true);
    expect(filter.enabled("warn", "http")).toBe(false);
  });

  it("should disable modules no directive matches when there is no default", () => {
    const filter = LevelFilter.parse("db=info");

    expect(filter.enabled("error", "http")).toBe(false);
    expect(filter.enabled("info", "db")).toBe(true);
  });

  it("should default an empty expression to error", () => {
    const filter = LevelFilter.parse(" , ");

    expect(filter.enabled("error", "any")).toBe(true);
    expect(filter.enabled("warn", "any")).toBe(false);
  });

  it("should be case-insensitive and accept warning", () => {
    const filter = LevelFilter.parse("WARNING,db=Debug");

    expect(filter.enabled("warn", "x")).toBe(true);
    expect(filter.enabled("debug", "db")).toBe(true);
  });

  it("should let a later duplicate directive win", () => {
    const filter = LevelFilter.parse("info,error");
    expect(filter.enabled("info", "x")).toBe(false);
  });

  it("should report the most verbose level", () => {
    expect(LevelFilter.parse("warn,db=debug").maxLevel).toBe("debug");
    expect(LevelFilter.parse("off").maxLevel).toBe("off");
    expect(LevelFilter.parse("off,db=error").maxLevel).toBe("error");
  });

  it.each([
    ["info,=debug", "empty module name"],
    ["db=loud", 'unknown level "loud"'],
    ["db=info=warn", 'more than one "="'],
    ["info/foo", "regex suffix"],
    ["db=", 'unknown level ""'],
  ])("should reject %s", (expression, reason) => {
    expect(() => LevelFilter.parse(expression)).toThrow(LevelFilterParseError);
    expect(() => LevelFilter.parse(expression)).toThrow(reason);
  });
});
