import { mkAttrConfig } from "../src/AttrNeeds";
import { PreconditionError } from "../src/errors";
import { updateAttributes } from "../src/updateAttributes";
import { SerialExecutor, TestDivData } from "./testUtils";

const partitions = [
  { key: "p1", value: "aaaa" },
  { key: "p2", value: "bb" },
];

test("collection attributes in one run", async () => {
  const executor = new SerialExecutor();
  const data = new TestDivData("collection", partitions);
  const { data: updated, computed, attrs } = await updateAttributes(data, executor, {
    estimateSize: (v) => (typeof v === "string" ? v.length : 0),
  });

  expect(computed).toBe(true);
  expect(executor.runs).toBe(1);
  expect(attrs.nDiv).toBe(2);
  expect(attrs.totObjectSize).toBe(6);
  expect(attrs.keys).toEqual(["p1", "p2"]);
  expect(attrs.keyHashes).toHaveLength(2);
  expect(attrs.splitSizeDistn?.[50]).toEqual({ prob: 0.5, value: 3 });

  // the input is left alone
  expect(data.attrs).toEqual({});
  expect(updated.getAttribute("nDiv")).toBe(2);
});

test("a dataset with every attribute present is returned unchanged", async () => {
  const executor = new SerialExecutor();
  const first = await updateAttributes(new TestDivData("collection", partitions), executor);
  const second = await updateAttributes(first.data, executor);

  expect(second.computed).toBe(false);
  expect(second.data).toBe(first.data);
  expect(second.attrs).toEqual({});
  expect(executor.runs).toBe(1);
});

test("only missing attributes are computed", async () => {
  const executor = new SerialExecutor();
  const data = new TestDivData("collection", partitions, { nDiv: 99, keys: ["old"] });
  const { data: updated, attrs } = await updateAttributes(data, executor);
  expect(Object.keys(attrs).sort()).toEqual(["splitSizeDistn", "totObjectSize"]);
  expect(updated.getAttribute("nDiv")).toBe(99);
  expect(updated.getAttribute("keys")).toEqual(["old"]);
});

test("execution control is passed to the executor", async () => {
  const executor = new SerialExecutor();
  const control = { reduceBatchSize: 3 };
  await updateAttributes(new TestDivData("collection", partitions), executor, { control });
  expect(executor.lastControl).toBe(control);
});

test("transformed views are rejected before any work", async () => {
  const executor = new SerialExecutor();
  await expect(
    updateAttributes(new TestDivData("collection", partitions, {}, true), executor)
  ).rejects.toThrow(PreconditionError);
  expect(executor.runs).toBe(0);
});

test("job parameters come from the options", async () => {
  const executor = new SerialExecutor();
  let setupRuns = 0;
  await updateAttributes(new TestDivData("frame", []), executor, {
    config: mkAttrConfig({ maxCategories: 7 }),
    setup: () => {
      setupRuns++;
    },
  });
  expect(setupRuns).toBe(1);
  expect(executor.lastJob?.params.maxCategories).toBe(7);
  expect(executor.lastJob?.params.transformFn).toBeNull();
});

test("an empty frame gets empty attributes", async () => {
  const { data, attrs } = await updateAttributes(
    new TestDivData("frame", []),
    new SerialExecutor()
  );
  expect(attrs.nDiv).toBe(0);
  expect(attrs.nRow).toBe(0);
  expect(attrs.keys).toEqual([]);
  expect(attrs.summary).toEqual({});
  expect(attrs.splitRowDistn?.[0]).toEqual({ prob: 0, value: null });
  expect(await updateAttributes(data, new SerialExecutor())).toMatchObject({
    computed: false,
  });
});
