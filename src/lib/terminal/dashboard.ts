import type { HistorySlot } from "../../domain/history.ts";
import type { Snapshot, TestSnapshot } from "../../domain/snapshot.ts";
import type { TestStatus } from "../../domain/status.ts";
import { ansi, padVisibleEnd, padVisibleStart, paint, type AnsiStyle } from "./ansi.ts";

export type DashboardOptions = {
  color: boolean;
  title?: string;
  formatTime?: (date: Date) => string;
};

type TextSink = {
  write(chunk: string): unknown;
};

const MIN_LABEL_WIDTH = 15;
const STATUS_WIDTH = 10;
const DESCRIPTION_WIDTH = 20;

const historySymbols: Record<TestStatus, string> = {
  up: ".",
  slow: "o",
  down: "X",
};

const statusStyles: Record<TestStatus, readonly AnsiStyle[]> = {
  up: ["green"],
  slow: ["bold", "yellow"],
  down: ["bold", "red"],
};

function formatLocalTime(date: Date): string {
  return date.toLocaleString();
}

function renderHistory(history: readonly HistorySlot[], color: boolean): string {
  return history
    .map((slot) => (slot === null ? " " : paint(historySymbols[slot], statusStyles[slot], color)))
    .join("");
}

function renderStatus(test: TestSnapshot, color: boolean): string {
  if (test.status === null) {
    return "-";
  }
  if (test.status === "down") {
    return paint("DOWN", statusStyles.down, color);
  }

  const text = test.latencyMs === undefined ? "UP" : `${test.latencyMs.toFixed(1)}ms`;
  return test.status === "slow" ? paint(text, statusStyles.slow, color) : text;
}

function renderLastSeen(test: TestSnapshot, formatTime: (date: Date) => string): string {
  if (test.status !== "down") {
    return "";
  }
  return test.lastUpAt ? `last up ${formatTime(test.lastUpAt)}` : "never up";
}

/** Renders one frame of the dashboard, history oldest to newest. */
export function renderDashboard(
  snapshot: Snapshot,
  { color, title = "hostwatch", formatTime = formatLocalTime }: DashboardOptions,
): string {
  const labelWidth = Math.max(
    MIN_LABEL_WIDTH,
    ...snapshot.hosts.flatMap((host) => host.tests.map((test) => test.label.length)),
  );
  const historyWidth = Math.max(
    "History".length,
    ...snapshot.hosts.flatMap((host) => host.tests.map((test) => test.history.length)),
  );
  const { up, slow, down, pending } = snapshot.summary;

  const lines = [
    `${paint(`${title} -`, ["bold"], color)} ${formatTime(snapshot.completedAt)}`,
    `cycle ${snapshot.cycle}: ${up} up, ${slow} slow, ${down} down` +
      (pending > 0 ? `, ${pending} pending` : ""),
    "",
  ];

  for (const host of snapshot.hosts) {
    lines.push(
      `${paint(padVisibleEnd(host.description, DESCRIPTION_WIDTH), ["bold"], color)} (${host.address})`,
    );
    lines.push(
      "    " +
        [
          padVisibleEnd("Test", labelWidth),
          padVisibleStart("Status", STATUS_WIDTH),
          "  " + padVisibleEnd("History", historyWidth),
          " Last seen",
        ].join(" "),
    );

    for (const test of host.tests) {
      const row = [
        padVisibleEnd(test.label, labelWidth),
        padVisibleStart(renderStatus(test, color), STATUS_WIDTH),
        "  " + padVisibleEnd(renderHistory(test.history, color), historyWidth),
        " " + renderLastSeen(test, formatTime),
      ].join(" ");
      lines.push(`    ${row}`.trimEnd());
    }

    lines.push("");
  }

  return lines.join("\n");
}

export type TerminalRendererOptions = DashboardOptions & {
  clearScreen?: boolean;
};

export function createTerminalRenderer(
  sink: TextSink,
  { clearScreen = true, ...options }: TerminalRendererOptions,
): (snapshot: Snapshot) => void {
  const prefix = clearScreen ? ansi.clearScreen : "";
  return (snapshot) => {
    sink.write(`${prefix}${renderDashboard(snapshot, options)}\n`);
  };
}
