/**
 * Binding groups and their positional reassembly per statement type.
 */
import { describe, expect, it } from "vitest";

import {
  BINDING_GROUPS,
  cleanBindings,
  createBindingGroups,
  flattenBindings,
  mergeOrderBindingsIntoSelect,
  prepareBindingsForDelete,
  prepareBindingsForRowIdUpdate,
  prepareBindingsForSelect,
  prepareBindingsForUpdate,
  raw,
  resolveValue,
} from "../src/plan";

describe("createBindingGroups", () => {
  it("fills every missing group with an empty list", () => {
    const groups = createBindingGroups({ where: [1] });
    expect(Object.keys(groups)).toEqual([...BINDING_GROUPS]);
    expect(groups.where).toEqual([1]);
    expect(groups.select).toEqual([]);
  });
});

describe("flattenBindings", () => {
  it("concatenates groups in placeholder order, whatever the key order", () => {
    expect(
      prepareBindingsForSelect({
        unionOrder: [9],
        order: [7],
        where: [4],
        select: [1],
        having: [6],
        union: [8],
        from: [2],
        groupBy: [5],
        join: [3],
      }),
    ).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("keeps an array value as a single binding", () => {
    expect(flattenBindings({ where: [[1, 2], 3] })).toEqual([[1, 2], 3]);
  });

  it("skips excluded groups", () => {
    expect(flattenBindings({ select: [1], join: [2], where: [3] }, ["select", "join"])).toEqual([
      3,
    ]);
  });
});

describe("mergeOrderBindingsIntoSelect", () => {
  it("appends order bindings to the select group", () => {
    const merged = mergeOrderBindingsIntoSelect({ select: [1], where: [3], order: [2] });
    expect(merged.select).toEqual([1, 2]);
    expect(merged.order).toEqual([]);
    expect(prepareBindingsForSelect(merged)).toEqual([1, 2, 3]);
  });
});

describe("cleanBindings", () => {
  it("drops expressions", () => {
    expect(cleanBindings([1, raw("now()"), "a"])).toEqual([1, "a"]);
  });
});

describe("resolveValue", () => {
  it("calls functions and passes other values through", () => {
    expect(resolveValue(() => 5)).toBe(5);
    expect(resolveValue("a")).toBe("a");
  });
});

describe("statement bindings", () => {
  const groups = { select: ["s"], join: ["j"], where: ["w"], order: ["o"] };

  it("orders update bindings as join, set values, then the rest", () => {
    expect(prepareBindingsForUpdate(groups, { a: 1, b: raw("now()"), c: () => 2 })).toEqual([
      "j",
      1,
      2,
      "w",
      "o",
    ]);
  });

  it("puts set values first for row identifier updates", () => {
    expect(prepareBindingsForRowIdUpdate(groups, { a: 1 })).toEqual([1, "j", "w", "o"]);
  });

  it("excludes select bindings from deletes", () => {
    expect(prepareBindingsForDelete(groups)).toEqual(["j", "w", "o"]);
  });
});
