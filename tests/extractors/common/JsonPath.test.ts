/**
 * JsonPath Test
 */

import { describe, it, expect } from "@jest/globals";
import { descendPath, toItemList } from "@/extractors/common/JsonPath";

describe("descendPath", () => {
  const payload = {
    data: {
      groups: [{ items: [{ name: "A" }] }, { items: [{ name: "B" }] }],
    },
  };

  it("walks object keys and array indices", () => {
    expect(descendPath(payload, ["data", "groups", 1, "items"])).toEqual([{ name: "B" }]);
  });

  it("accepts digit strings as indices", () => {
    expect(descendPath(payload, ["data", "groups", "0", "items"])).toEqual([{ name: "A" }]);
  });

  it("yields an empty list for a missing key", () => {
    expect(descendPath(payload, ["data", "missing"])).toEqual([]);
  });

  it("stops when the step does not fit the shape", () => {
    expect(descendPath(payload, ["data", "groups", "first"])).toEqual(payload.data.groups);
  });
});

describe("toItemList", () => {
  it("wraps a single value and drops empty ones", () => {
    expect(toItemList({ name: "A" })).toEqual([{ name: "A" }]);
    expect(toItemList(null)).toEqual([]);
    expect(toItemList({})).toEqual([]);
    expect(toItemList([1, 2])).toEqual([1, 2]);
  });
});
