import { describe, it, expect } from "vitest";
import { moveName } from "./editor.js";
import { groupNames } from "./grouper.js";
import { NameNotFoundInGroupError, SourceGroupNotFoundError } from "./errors.js";
import type { Grouping } from "./types.js";

function sample(): Grouping {
  return groupNames(["foo", "foo-bar", "foo-baz", "xyz"], "-");
}

describe("moveName", () => {
  it("should move a name and drop the emptied source group", () => {
    const result = moveName(sample(), "xyz", "xyz", "foo");

    expect([...result.entries()]).toEqual([["foo", ["foo", "foo-bar", "foo-baz", "xyz"]]]);
  });

  it("should create a missing target group holding only the moved name", () => {
    const result = moveName(sample(), "foo-bar", "foo", "bar");

    expect([...result.entries()]).toEqual([
      ["foo", ["foo", "foo-baz"]],
      ["xyz", ["xyz"]],
      ["bar", ["foo-bar"]],
    ]);
  });

  it("should append to an existing target group", () => {
    const result = moveName(sample(), "foo-baz", "foo", "xyz");

    expect(result.get("xyz")).toEqual(["xyz", "foo-baz"]);
    expect(result.get("foo")).toEqual(["foo", "foo-bar"]);
  });

  it("should move a name into the empty-key group", () => {
    const result = moveName(sample(), "xyz", "xyz", "");

    expect(result.get("")).toEqual(["xyz"]);
    expect(result.has("xyz")).toBe(false);
  });

  it("should treat a move into the same group as a no-op", () => {
    const grouping = sample();
    const result = moveName(grouping, "foo-bar", "foo", "foo");

    expect(result).toEqual(grouping);
    expect(result).not.toBe(grouping);
  });

  it("should keep a single-name group on a same-group move", () => {
    const result = moveName(sample(), "xyz", "xyz", "xyz");

    expect(result.get("xyz")).toEqual(["xyz"]);
  });

  it("should fail for a missing source group and leave the grouping unchanged", () => {
    const grouping = sample();
    const before = structuredClone(grouping);

    expect(() => moveName(grouping, "xyz", "nope", "foo")).toThrow(SourceGroupNotFoundError);
    expect(() => moveName(grouping, "xyz", "nope", "foo")).toThrow("Group not found: nope.");
    expect(grouping).toEqual(before);
  });

  it("should fail for a name missing from the source group and leave the grouping unchanged", () => {
    const grouping = sample();
    const before = structuredClone(grouping);

    expect(() => moveName(grouping, "xyz", "foo", "xyz")).toThrow(NameNotFoundInGroupError);
    expect(() => moveName(grouping, "xyz", "foo", "xyz")).toThrow("'xyz' not found in group 'foo'.");
    expect(grouping).toEqual(before);
  });

  it("should report the moved name and its source group", () => {
    try {
      moveName(sample(), "xyz", "foo", "xyz");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(NameNotFoundInGroupError);
      if (err instanceof NameNotFoundInGroupError) {
        expect(err.movedName).toBe("xyz");
        expect(err.group).toBe("foo");
        expect(err.field).toBe("name");
        expect(err.name).toBe("NameNotFoundInGroupError");
      }
    }
  });

  it("should check the name even when source and target are equal", () => {
    expect(() => moveName(sample(), "xyz", "foo", "foo")).toThrow(NameNotFoundInGroupError);
    expect(() => moveName(sample(), "xyz", "nope", "nope")).toThrow(SourceGroupNotFoundError);
  });

  it("should move only one occurrence of a duplicated name", () => {
    const grouping = groupNames(["a_1", "a_1", "b"]);
    const result = moveName(grouping, "a_1", "a", "b");

    expect(result.get("a")).toEqual(["a_1"]);
    expect(result.get("b")).toEqual(["b", "a_1"]);
  });

  it("should not mutate the input grouping", () => {
    const grouping = sample();
    moveName(grouping, "xyz", "xyz", "foo");

    expect(grouping.get("xyz")).toEqual(["xyz"]);
    expect(grouping.get("foo")).toEqual(["foo", "foo-bar", "foo-baz"]);
  });

  it("should expose the offending field and code on errors", () => {
    try {
      moveName(sample(), "xyz", "nope", "foo");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SourceGroupNotFoundError);
      if (err instanceof SourceGroupNotFoundError) {
        expect(err.code).toBe("SOURCE_GROUP_NOT_FOUND");
        expect(err.field).toBe("source_group");
        expect(err.group).toBe("nope");
      }
    }
  });
});
