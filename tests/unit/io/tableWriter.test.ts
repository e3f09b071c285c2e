import { Writable } from "node:stream";

import { expect, test } from "vitest";

import { colorize, colorizeStatus, formatAmount, formatDate } from "@/io/formatters";
import { fieldColumn, statusColumn } from "@/io/table/columns";
import { TableWriter } from "@/io/table/tableWriter";

function createCapture() {
  let data = "";
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      data += chunk.toString();
      callback();
    },
  });
  return {
    stream,
    output: () => data,
  };
}

test("formatDate preserves string dates and normalizes Date objects", () => {
  expect(formatDate("2026-01-04")).toBe("2026-01-04");
  expect(formatDate(new Date("2026-01-04T12:00:00Z"))).toBe("2026-01-04");
  expect(formatDate(null)).toBe("");
});

test("column helpers build table columns", () => {
  const id = fieldColumn<{ id: string }>("id");
  const seq = fieldColumn<{ seq: number }>("seq", { header: "Seq", align: "right", maxWidth: 6 });
  const status = statusColumn<{ result: string }>("result", "Result");

  expect(id.header).toBe("id");
  expect(seq).toMatchObject({ header: "Seq", align: "right", maxWidth: 6 });
  expect(status.header).toBe("Result");
  expect(status.format?.("conflict", { result: "conflict" })).toBe("\x1b[31mconflict\x1b[0m");
});

test("TableWriter renders a padded table", () => {
  const capture = createCapture();
  const writer = new TableWriter<{ id: string; date: string; count: number }>({
    stdout: capture.stream,
  });

  writer.write({
    columns: [
      fieldColumn("id", { header: "ID" }),
      fieldColumn("date", { header: "Date", format: (value) => formatDate(String(value)) }),
      fieldColumn("count", { header: "Count", align: "right" }),
    ],
    rows: [
      { id: "a", date: "2026-01-04", count: 2 },
      { id: "bb", date: "2026-01-05", count: 12 },
    ],
  });

  expect(capture.output()).toBe(
    "ID  Date        Count\n" +
      "--  ----------  -----\n" +
      "a   2026-01-04      2\n" +
      "bb  2026-01-05     12\n",
  );
});

test("TableWriter pads colored cells by their visible width", () => {
  const capture = createCapture();
  const writer = new TableWriter<{ status: string }>({ stdout: capture.stream });

  writer.write({ columns: [statusColumn("status")], rows: [{ status: "applied" }, { status: "noop" }] });

  expect(capture.output()).toBe("Status \n-------\n\x1b[32mapplied\x1b[0m\nnoop   \n");
});

test("TableWriter clips long cells and joins set values", () => {
  const capture = createCapture();
  const writer = new TableWriter<{ notes: string | null; tags: string[] }>({ stdout: capture.stream });

  writer.write({
    columns: [fieldColumn("notes", { header: "Notes", maxWidth: 6 }), fieldColumn("tags", { header: "Tags" })],
    rows: [
      { notes: "a long note", tags: ["a", "b"] },
      { notes: null, tags: [] },
    ],
  });

  expect(capture.output()).toBe("Notes   Tags\n------  ----\na lon…  a,b \n            \n");
});

test("TableWriter strips colors under noColor", () => {
  const capture = createCapture();
  const writer = new TableWriter<{ status: string }>({ stdout: capture.stream, noColor: true });

  writer.write({
    columns: [fieldColumn("status", { header: "Status", format: (value) => colorizeStatus(String(value)) })],
    rows: [{ status: "applied" }, { status: "conflict" }],
  });

  expect(capture.output()).toBe("Status  \n--------\napplied \nconflict\n");
});

test("colorizeStatus wraps known statuses only", () => {
  expect(colorizeStatus("applied")).toBe("\x1b[32mapplied\x1b[0m");
  expect(colorizeStatus("conflict")).toBe("\x1b[31mconflict\x1b[0m");
  expect(colorizeStatus("noop")).toBe("noop");
  expect(colorize("", "red")).toBe("");
});

test("formatAmount shows two decimals for numeric values", () => {
  expect(formatAmount(12.5)).toBe("12.50");
  expect(formatAmount("-3")).toBe("-3.00");
  expect(formatAmount("n/a")).toBe("n/a");
  expect(formatAmount(null)).toBe("");
});
