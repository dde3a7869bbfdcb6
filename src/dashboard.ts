import blessed from "blessed";
import contrib from "blessed-contrib";
import { successRatio } from "./report.js";
import { BatchEntry } from "./types.js";

/**
 * Full-screen summary of a batch run: attempts per file, success rate and
 * the result table. Resolves once the user closes it.
 */
export function showBatchDashboard(entries: BatchEntry[]): Promise<void> {
  return new Promise((resolve) => {
    const screen = blessed.screen({
      smartCSR: true,
      title: "linefix summary",
      fullUnicode: true,
    });
    const grid = new contrib.grid({ rows: 2, cols: 2, screen });

    const bar = grid.set(0, 0, 1, 2, contrib.bar, {
      label: " Attempts per File (q to close) ",
      barWidth: 6,
      barSpacing: 4,
      xOffset: 0,
      maxHeight: Math.max(1, ...entries.map((entry) => entry.attempts)),
    });
    bar.setData({
      titles: entries.map((entry) => entry.file),
      data: entries.map((entry) => entry.attempts),
    });

    const { success, failure } = successRatio(entries);
    const donut = grid.set(1, 0, 1, 1, contrib.donut, {
      label: " Success Rate ",
      radius: 10,
      arcWidth: 3,
      remainColor: "black",
      yPadding: 2,
    });
    donut.setData([
      { percent: Math.round(success), label: "Success", color: "green" },
      { percent: Math.round(failure), label: "Failure", color: "red" },
    ]);

    const table = grid.set(1, 1, 1, 1, contrib.table, {
      label: " Results ",
      keys: true,
      interactive: false,
      columnSpacing: 2,
      columnWidth: [24, 9, 9],
    });
    table.setData({
      headers: ["file", "success", "attempts"],
      data: entries.map((entry) => [
        entry.file,
        String(entry.success),
        String(entry.attempts),
      ]),
    });

    screen.key(["escape", "q", "C-c"], () => {
      screen.destroy();
      resolve();
    });
    screen.render();
  });
}
