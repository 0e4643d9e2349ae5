import { assert, describe, test } from "@skein-tui/testkit";
import { isSkeinError } from "../../errors.js";
import { createObjectList } from "../objectList.js";
import { compareKeys } from "../sortKey.js";

type Job = { name: string; priority: number };
type Row = { job: Job; refreshes: number; prepared: number };

function jobList(keyFunction?: (job: Job) => number) {
  return createObjectList<Job, Row>({
    createWidget: (job) => ({ job, refreshes: 0, prepared: 0 }),
    ...(keyFunction === undefined ? {} : { keyFunction }),
    prepareWidget: (row) => {
      row.prepared++;
    },
    refreshWidget: (row) => {
      row.refreshes++;
    },
  });
}

const names = (jobs: readonly Job[]) => jobs.map((job) => job.name);

describe("widgets/sortKey", () => {
  test("compareKeys orders atoms and tuples", () => {
    assert.equal(compareKeys(1, 2), -1);
    assert.equal(compareKeys("b", "a"), 1);
    assert.equal(compareKeys([1, "a"], [1, "a"]), 0);
    assert.equal(compareKeys([1, "a"], [1, "b"]), -1);
    assert.equal(compareKeys([1], [1, "a"]), -1);
    assert.equal(compareKeys(2n, 1), 1);
    assert.equal(compareKeys(new Date(5), new Date(4)), 1);
    assert.equal(compareKeys(false, true), -1);
  });

  test("mixed kinds order by kind", () => {
    assert.ok(compareKeys(true, 0) < 0);
    assert.ok(compareKeys(100, "0") < 0);
    assert.ok(compareKeys(new Date(0), "a") < 0);
  });
});

describe("widgets/ObjectContainer", () => {
  test("keeps items sorted by key as they are added", () => {
    const { items } = jobList((job) => job.priority);
    items.addItem({ name: "A", priority: 3 });
    items.addItem({ name: "B", priority: 1 });
    items.addItem({ name: "C", priority: 2 });
    assert.deepEqual(names(items.items()), ["B", "C", "A"]);
  });

  test("order stays non-decreasing across adds and removes", () => {
    const { items } = jobList((job) => job.priority);
    const jobs = [7, 3, 9, 3, 1, 8, 5, 1, 6].map((priority, i) => ({ name: `j${String(i)}`, priority }));
    for (const job of jobs) items.addItem(job);
    for (const index of [2, 4, 0]) {
      const job = jobs[index];
      if (job !== undefined) items.removeItem(job);
    }
    items.addItem({ name: "late", priority: 4 });
    const priorities = items.items().map((job) => job.priority);
    assert.deepEqual(priorities, [1, 3, 3, 4, 5, 6, 8]);
    assert.deepEqual(names(items.items()).slice(1, 3), ["j1", "j3"]);
  });

  test("equal keys keep insertion order", () => {
    const { items } = jobList((job) => job.priority);
    items.addItem({ name: "x", priority: 1 });
    items.addItem({ name: "y", priority: 0 });
    items.addItem({ name: "z", priority: 1 });
    items.addItem({ name: "w", priority: 1 });
    assert.deepEqual(names(items.items()), ["y", "x", "z", "w"]);
  });

  test("an item whose key cannot be computed is left out entirely", () => {
    const { list, items } = jobList((job) => {
      if (job.priority < 0) throw new RangeError(`bad priority for ${job.name}`);
      return job.priority;
    });
    items.addItem({ name: "a", priority: 1 });
    items.addItem({ name: "b", priority: 2 });
    const bad = { name: "bad", priority: -1 };
    assert.throws(() => items.addItem(bad), RangeError);
    assert.equal(items.containsItem(bad), false);
    assert.equal(items.getWidgetForItem(bad), undefined);
    assert.equal(items.size, 2);
    assert.equal(list.length, 2);
    assert.deepEqual(names(items.items()), ["a", "b"]);
  });

  test("the default key keeps insertion order", () => {
    const { items } = jobList();
    items.addItem({ name: "c", priority: 0 });
    items.addItem({ name: "a", priority: 9 });
    items.addItem({ name: "b", priority: 5 });
    assert.deepEqual(names(items.items()), ["c", "a", "b"]);
  });

  test("maps items and widgets both ways", () => {
    const { list, items } = jobList();
    const job = { name: "a", priority: 0 };
    const row = items.addItem(job);
    assert.equal(row.prepared, 1);
    assert.equal(items.addItem(job), row);
    assert.equal(items.size, 1);
    assert.equal(list.length, 1);
    assert.equal(items.containsItem(job), true);
    assert.equal(items.getWidgetForItem(job), row);
    assert.equal(items.getItemForWidget(row), job);
    assert.equal(items.selectedItem, job);
  });

  test("getWidgetForItem creates on demand only when asked", () => {
    const { items } = jobList();
    const job = { name: "a", priority: 0 };
    assert.equal(items.getWidgetForItem(job), undefined);
    assert.equal(items.containsItem(job), false);
    const row = items.getWidgetForItem(job, true);
    assert.equal(row?.job, job);
    assert.equal(items.containsItem(job), true);
  });

  test("removeItem returns the widget and throws when the item is absent", () => {
    const { list, items } = jobList();
    const job = { name: "a", priority: 0 };
    const row = items.addItem(job);
    assert.equal(items.removeItem(job), row);
    assert.equal(list.length, 0);
    assert.equal(items.getItemForWidget(row), undefined);
    assert.throws(
      () => items.removeItem(job),
      (err: unknown) => isSkeinError(err, "SKEIN_NOT_FOUND"),
    );
  });

  test("refreshItem refreshes only known items unless asked to create", () => {
    const { items } = jobList();
    const job = { name: "a", priority: 0 };
    assert.equal(items.refreshItem(job), false);
    assert.equal(items.refreshItem(job, true), true);
    assert.equal(items.getWidgetForItem(job)?.refreshes, 1);
  });

  test("updateOrder re-sorts after keys change and keeps focus", () => {
    const { list, items } = jobList((job) => job.priority);
    const a = { name: "A", priority: 1 };
    const b = { name: "B", priority: 2 };
    const c = { name: "C", priority: 3 };
    items.addItem(a);
    items.addItem(b);
    const rowC = items.addItem(c);
    list.focusPosition = 1;
    assert.equal(items.selectedItem, b);

    a.priority = 5;
    b.priority = 0;
    items.updateOrder();

    assert.deepEqual(names(items.items()), ["B", "C", "A"]);
    assert.equal(items.selectedItem, b);
    assert.equal(list.focusPosition, 0);
    assert.equal(rowC.refreshes, 1);
  });

  test("changing the key function re-prepares widgets and re-sorts", () => {
    const { items } = jobList((job) => job.priority);
    const rowA = items.addItem({ name: "A", priority: 2 });
    items.addItem({ name: "B", priority: 1 });
    assert.deepEqual(names(items.items()), ["B", "A"]);

    items.keyFunction = (job) => -job.priority;
    assert.deepEqual(names(items.items()), ["A", "B"]);
    assert.equal(rowA.prepared, 2);
    assert.equal(rowA.refreshes, 1);
  });

  test("clear empties both the mapping and the container", () => {
    const { list, items } = jobList();
    items.addItem({ name: "a", priority: 0 });
    items.addItem({ name: "b", priority: 0 });
    items.clear();
    assert.equal(items.size, 0);
    assert.equal(list.length, 0);
    assert.equal(items.selectedItem, undefined);
  });
});
