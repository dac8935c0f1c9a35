import {
  MapTaskError,
  PreconditionError,
  Row,
  SchemaError,
  TableRep,
  mkAttrConfig,
  updateAttributes,
} from "divstats";
import { LocalExecutor } from "../src/LocalExecutor";
import { MemoryDivData } from "../src/MemoryDivData";
import { frameFromRows } from "../src/frame";

const rowsOf = (xs: Array<number | null>, names: Array<string | null>): Row[] =>
  xs.map((x, i) => ({ x, name: names[i] }));

const mkFrame = () =>
  MemoryDivData.frame([
    { key: "p1", value: frameFromRows(rowsOf([1, 2, 3], ["a", "a", "b"])) },
    { key: "p2", value: frameFromRows(rowsOf([4, 5], ["c", null])) },
  ]);

test("attributes of a divided frame", async () => {
  const executor = new LocalExecutor();
  const { data, computed, attrs } = await updateAttributes(mkFrame(), executor);

  expect(computed).toBe(true);
  expect(attrs.nDiv).toBe(2);
  expect(attrs.nRow).toBe(5);
  expect(attrs.keys).toEqual(["p1", "p2"]);
  expect(data.hasKey("p2")).toBe(true);
  expect(data.hasKey("p3")).toBe(false);
  // [2, 3] at p = 0.5
  expect(attrs.splitRowDistn?.[50]).toEqual({ prob: 0.5, value: 2.5 });

  const x = attrs.summary?.x;
  if (x === undefined || x.summaryType !== "numeric") {
    throw new Error("expected a numeric summary for x");
  }
  expect(x.naCount).toBe(0);
  expect(x.range).toEqual([1, 5]);
  expect(x.stats.mean).toBeCloseTo(3, 12);
  expect(x.stats.variance).toBeCloseTo(2.5, 12);

  expect(attrs.summary?.name).toEqual({
    summaryType: "categorical",
    naCount: 1,
    freqTable: [
      { value: "a", freq: 2 },
      { value: "b", freq: 1 },
      { value: "c", freq: 1 },
    ],
    complete: true,
  });
});

test("row counts and their distribution", async () => {
  const partRows = (n: number): Row[] => Array.from({ length: n }, (v, i) => ({ x: i }));
  const { attrs } = await updateAttributes(
    MemoryDivData.frame([
      { key: "a", value: frameFromRows(partRows(10)) },
      { key: "b", value: frameFromRows(partRows(0)) },
      { key: "c", value: frameFromRows(partRows(5)) },
    ]),
    new LocalExecutor()
  );
  expect(attrs.nRow).toBe(15);
  expect(attrs.nDiv).toBe(3);
  // percentiles of the pool [10, 0, 5]
  expect(attrs.splitRowDistn).toHaveLength(101);
  expect(attrs.splitRowDistn?.[0]).toEqual({ prob: 0, value: 0 });
  expect(attrs.splitRowDistn?.[25].value).toBeCloseTo(2.5, 12);
  expect(attrs.splitRowDistn?.[50]).toEqual({ prob: 0.5, value: 5 });
  expect(attrs.splitRowDistn?.[100]).toEqual({ prob: 1, value: 10 });
});

test("an all-missing partition still counts its missing values", async () => {
  const { attrs } = await updateAttributes(
    MemoryDivData.frame([
      { key: 1, value: frameFromRows([{ x: 1, s: "u" }, { x: 2, s: "v" }]) },
      { key: 2, value: frameFromRows([{ x: null, s: null }, { x: null, s: null }]) },
    ]),
    new LocalExecutor()
  );
  const x = attrs.summary?.x;
  if (x === undefined || x.summaryType !== "numeric") {
    throw new Error("expected a numeric summary for x");
  }
  expect(x.naCount).toBe(2);
  expect(x.range).toEqual([1, 2]);
  expect(x.stats.mean).toBeCloseTo(1.5, 12);

  expect(attrs.summary?.s).toEqual({
    summaryType: "categorical",
    naCount: 2,
    freqTable: [
      { value: "u", freq: 1 },
      { value: "v", freq: 1 },
    ],
    complete: true,
  });
});

test("a partition without a column counts it as missing", async () => {
  const { attrs } = await updateAttributes(
    MemoryDivData.frame([
      { key: "p", value: frameFromRows([{ x: 1.5, y: "a" }]) },
      { key: "q", value: frameFromRows([{ y: "b" }, { y: "c" }]) },
    ]),
    new LocalExecutor()
  );
  expect(attrs.summary?.x).toMatchObject({ summaryType: "numeric", naCount: 2, range: [1.5, 1.5] });
  expect(Object.keys(attrs.summary ?? {})).toEqual(["x", "y"]);
});

test("partitions that disagree on a column's kind are rejected", () => {
  expect(() =>
    MemoryDivData.frame([
      { key: "p", value: frameFromRows([{ x: 1 }]) },
      { key: "q", value: frameFromRows([{ x: "one" }]) },
    ])
  ).toThrow(SchemaError);
  expect(() =>
    MemoryDivData.frame([
      { key: "p", value: frameFromRows([{ x: 1 }]) },
      { key: "q", value: frameFromRows([{ x: true }]) },
    ])
  ).toThrow("unifySchemas: column 'x' has conflicting kinds across partitions: integer, boolean");
});

test("integer and real partitions make a real column", () => {
  const data = MemoryDivData.frame([
    { key: "p", value: frameFromRows([{ x: 1 }]) },
    { key: "q", value: frameFromRows([{ x: 0.5 }]) },
  ]);
  const q = data.getPartition("q")?.value;
  if (!(q instanceof TableRep)) {
    throw new Error("expected a table");
  }
  expect(q.schema.columnType("x").kind).toBe("real");
});

test("a small category cap truncates the table", async () => {
  const { attrs } = await updateAttributes(mkFrame(), new LocalExecutor(), {
    config: mkAttrConfig({ maxCategories: 2 }),
  });
  expect(attrs.summary?.name).toEqual({
    summaryType: "categorical",
    naCount: 1,
    freqTable: [
      { value: "a", freq: 2 },
      { value: "b", freq: 1 },
    ],
    complete: false,
  });
});

test("updating an up-to-date dataset is a no-op", async () => {
  const executor = new LocalExecutor();
  const first = await updateAttributes(mkFrame(), executor);
  const second = await updateAttributes(first.data, executor);
  expect(second.computed).toBe(false);
  expect(second.data).toBe(first.data);
});

test("reduce batch size does not change results", async () => {
  const parts = [3, 1, 4, 1, 5, 9, 2, 6].map((n, i) => ({
    key: i,
    value: frameFromRows(rowsOf([n, n * 2], ["u", String(n)])),
  }));
  const run = (reduceBatchSize: number) =>
    updateAttributes(MemoryDivData.frame(parts), new LocalExecutor(), {
      control: { reduceBatchSize },
    });
  const one = await run(1);
  const many = await run(64);

  expect(one.attrs.keys).toEqual(many.attrs.keys);
  expect(one.attrs.nRow).toBe(16);
  expect(one.attrs.splitRowDistn).toEqual(many.attrs.splitRowDistn);
  expect(one.attrs.summary?.name).toEqual(many.attrs.summary?.name);
  const x1 = one.attrs.summary?.x;
  const x2 = many.attrs.summary?.x;
  if (
    x1 === undefined ||
    x2 === undefined ||
    x1.summaryType !== "numeric" ||
    x2.summaryType !== "numeric"
  ) {
    throw new Error("expected numeric summaries for x");
  }
  expect(x1.range).toEqual([1, 18]);
  expect(x1.stats.mean).toBeCloseTo(x2.stats.mean ?? NaN, 10);
  expect(x1.stats.variance).toBeCloseTo(x2.stats.variance ?? NaN, 10);

  await expect(run(0)).rejects.toThrow(
    "LocalExecutor: reduceBatchSize must be a positive integer, got 0"
  );
});

test("collections of raw values with a row view", async () => {
  const raw = MemoryDivData.collection([
    { key: { id: 1 }, value: [{ v: 1.5 }, { v: 2.5 }] },
    { key: { id: 2 }, value: [] },
  ]);
  const { attrs } = await updateAttributes(raw, new LocalExecutor(), {
    estimateSize: () => 10,
  });
  expect(attrs).toMatchObject({ nDiv: 2, totObjectSize: 20, keys: [{ id: 1 }, { id: 2 }] });
  expect(attrs.nRow).toBeUndefined();

  const rowView = new MemoryDivData("frame", raw.partitions, {
    columns: ["v"],
    transformFn: (key, value) =>
      frameFromRows(Array.isArray(value) ? value : [], {
        columns: ["v"],
        columnKinds: { v: "real" },
      }),
  });
  const frameAttrs = (await updateAttributes(rowView, new LocalExecutor())).attrs;
  expect(frameAttrs.nRow).toBe(2);
  expect(Object.keys(frameAttrs.summary ?? {})).toEqual(["v"]);
});

test("transformed views are rejected", async () => {
  const view = mkFrame().addTransform((key, value) => value);
  expect(view.isTransformed()).toBe(true);
  await expect(updateAttributes(view, new LocalExecutor())).rejects.toThrow(
    PreconditionError
  );
});

test("map failures reject the run", async () => {
  const bad = new MemoryDivData("frame", [
    { key: "ok", value: frameFromRows([{ x: 1 }]) },
    { key: "bad", value: "not a table" },
  ]);
  await expect(updateAttributes(bad, new LocalExecutor())).rejects.toThrow(
    'buildLocalContributions: partition "bad" is not a table'
  );
  await expect(updateAttributes(bad, new LocalExecutor())).rejects.toBeInstanceOf(
    MapTaskError
  );
  await expect(updateAttributes(bad, new LocalExecutor())).rejects.toMatchObject({
    partitionKey: "bad",
  });
});

test("partition lookup by key", () => {
  const data = mkFrame();
  expect(data.divCount).toBe(2);
  expect(data.getPartition("p1")?.value).toBeInstanceOf(TableRep);
  expect(data.getPartition("nope")).toBeUndefined();
  expect(data.hasKey("p1")).toBe(true);
  expect(data.columnNames()).toEqual(["x", "name"]);
  expect(MemoryDivData.collection([]).columnNames()).toBeNull();
});
