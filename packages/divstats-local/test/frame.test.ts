import { Schema, SchemaError, columnTypes } from "divstats";
import { frameFromRows, inferColumnKind } from "../src/frame";
import { MemoryDivData } from "../src/MemoryDivData";

test("column kinds are inferred from present values", () => {
  expect(inferColumnKind([1, 2, null, undefined])).toBe("integer");
  expect(inferColumnKind([1, 2.5])).toBe("real");
  expect(inferColumnKind([NaN, 0.5])).toBe("real");
  expect(inferColumnKind([BigInt(3)])).toBe("integer");
  expect(inferColumnKind(["a", null])).toBe("string");
  expect(inferColumnKind([true, false])).toBe("boolean");
  expect(inferColumnKind([new Date(0)])).toBe("datetime");
  expect(inferColumnKind([1, "a"])).toBe("blob");
  expect(inferColumnKind([null, undefined])).toBe("blob");
  expect(inferColumnKind([])).toBe("blob");
});

test("frames from rows", () => {
  const t = frameFromRows([
    { id: 1, name: "x" },
    { id: 2, when: new Date(0) },
  ]);
  expect(t.schema.columns).toEqual(["id", "name", "when"]);
  expect(t.schema.columnType("id").kind).toBe("integer");
  expect(t.schema.columnFamily("name")).toBe("categorical");
  expect(t.schema.columnFamily("when")).toBe("datetime");
  expect(t.rowCount).toBe(2);
  expect(t.getColumn("name")).toEqual(["x", undefined]);
});

test("declared columns and kinds win over inference", () => {
  const t = frameFromRows([{ a: 1, b: 2, c: 3 }], {
    columns: ["c", "a"],
    columnKinds: { a: "factor" },
  });
  expect(t.schema.columns).toEqual(["c", "a"]);
  expect(t.schema.columnFamily("a")).toBe("categorical");
  expect(t.schema.columnFamily("c")).toBe("numeric");
  expect(t.schema.hasColumn("b")).toBe(false);
});

test("schemas need metadata for every column", () => {
  expect(
    () => new Schema(["a", "b"], { a: { displayName: "a", columnType: columnTypes.real } })
  ).toThrow(SchemaError);
  expect(() => frameFromRows([{ a: 1 }]).getColumn("b")).toThrow(
    'TableRep.getColumn: no such column "b"'
  );
});

test("attributes are set on a copy", () => {
  const base = MemoryDivData.collection([{ key: "k", value: 1 }], { attrs: { nDiv: 1 } });
  const updated = base.setAttributes({ nRow: 3 });
  expect(updated.getAttributes()).toEqual({ nDiv: 1, nRow: 3 });
  expect(base.getAttributes()).toEqual({ nDiv: 1 });
  expect(updated.hasAttribute("nRow")).toBe(true);
  expect(base.hasAttribute("nRow")).toBe(false);
  expect(base.hasAttribute("toString")).toBe(false);

  const view = updated.addTransform((key, value) => value);
  expect(view.getAttributes()).toEqual({});
  expect(view.partitions).toBe(base.partitions);
});
