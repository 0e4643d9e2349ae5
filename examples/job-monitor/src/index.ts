import { setTimeout as sleep } from "node:timers/promises";
import { ThreadPool, createLogger, createObjectList, toError } from "@skein-tui/core";
import { createNodeApp } from "@skein-tui/node";

type JobState = "queued" | "running" | "done" | "failed";

type Job = {
  id: number;
  name: string;
  steps: number;
  progress: number;
  state: JobState;
  failAt: number | null;
};

type Row = { job: Job; text: string };

type MonitorEvent = Readonly<{ kind: "clock"; at: number }>;

const STATE_ORDER: Readonly<Record<JobState, number>> = {
  running: 0,
  queued: 1,
  failed: 2,
  done: 3,
};

function formatRow(job: Job): string {
  const filled = Math.round((job.progress / job.steps) * 20);
  const bar = `${"#".repeat(filled)}${".".repeat(20 - filled)}`;
  return `${job.name.padEnd(14)} [${bar}] ${job.state}`;
}

const rows = createObjectList<Job, Row>({
  createWidget: (job) => ({ job, text: "" }),
  keyFunction: (job) => [STATE_ORDER[job.state], job.id],
  prepareWidget: (row) => {
    row.text = formatRow(row.job);
  },
  refreshWidget: (row) => {
    row.text = formatRow(row.job);
  },
});

const log = createLogger("job-monitor");

let clock = "";
const pool = new ThreadPool({ size: 2, name: "jobs" });

const app = createNodeApp<MonitorEvent>({
  view: () => {
    const lines = rows.list.iterWidgets().map((row) => {
      const marker = row === rows.list.focusedWidget ? ">" : " ";
      return `${marker} ${row.text}`;
    });
    return [`job monitor ${clock}`, "", ...lines, "", "j/k move  r retry  q quit"].join("\n");
  },
  onEvent: (event) => {
    clock = new Date(event.at).toLocaleTimeString();
  },
  onInput: (key, owner) => {
    if (key === "j" || key === "down") rows.list.moveFocus(1);
    else if (key === "k" || key === "up") rows.list.moveFocus(-1);
    else if (key === "r") retry(rows.items.selectedItem);
    else return false;
    owner.refresh();
    return true;
  },
});

function update(job: Job, change: Partial<Pick<Job, "progress" | "state">>): void {
  app.callOnUiThread(() => {
    const reorder = change.state !== undefined && change.state !== job.state;
    Object.assign(job, change);
    if (reorder) rows.items.updateOrder();
    else rows.items.refreshItem(job);
  });
}

async function runJob(job: Job): Promise<number> {
  update(job, { state: "running", progress: 0 });
  for (let step = 1; step <= job.steps; step++) {
    await sleep(150 + job.id * 40);
    if (job.failAt === step) throw new Error(`${job.name} failed at step ${String(step)}`);
    update(job, { progress: step });
  }
  return job.steps;
}

function submit(job: Job): void {
  pool
    .submit(runJob, job)
    .then((handle) => {
      handle
        .onResult(() => update(job, { state: "done" }))
        .onError(() => update(job, { state: "failed" }));
    })
    .catch((err: unknown) => {
      log.warn("job not submitted", { job: job.name, error: toError(err) });
    });
}

function retry(job: Job | undefined): void {
  if (job === undefined || (job.state !== "done" && job.state !== "failed")) return;
  job.failAt = null;
  job.state = "queued";
  job.progress = 0;
  rows.items.updateOrder();
  submit(job);
}

const names = ["index-build", "thumbnails", "backup", "flaky-export", "report"];
names.forEach((name, index) => {
  const job: Job = {
    id: index,
    name,
    steps: 10,
    progress: 0,
    state: "queued",
    failAt: name.startsWith("flaky") ? 6 : null,
  };
  rows.items.addItem(job);
});

const clockDaemon = app.createDaemon(async (ui) => {
  while (!ui.isStopRequested()) {
    ui.injectEvent({ kind: "clock", at: Date.now() });
    await sleep(1000);
  }
});
clockDaemon.start();

app.callLater(() => {
  for (const job of rows.items.items()) submit(job);
}, { afterMs: 200 });

try {
  await app.run();
} finally {
  pool.stop();
  app.dispose();
}
