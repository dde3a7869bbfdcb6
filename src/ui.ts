import path from "node:path";
import blessed from "blessed";
import contrib from "blessed-contrib";
import { RepairLogger, RepairSession, RepairState } from "./types.js";

export interface BlessedUI {
  initialize: () => void;
  isActive: () => boolean;
  /** One-line summary of the session in progress, shown above the panes */
  setStatus: (text: string) => void;
  appendOutputLog: (text: string) => void;
  appendReasoningLog: (text: string) => void;
  render: () => void;
  destroy: () => void;
}

const filterCursorCodes = (text: string) => text.replace(/\x1B\[\?25[hl]/g, "");

// 12-row grid: status strip, harness output, repair log
const LAYOUT = {
  status: { row: 0, rowSpan: 2 },
  output: { row: 2, rowSpan: 5 },
  repair: { row: 7, rowSpan: 5 },
};

export function formatRepairStatus(
  session: RepairSession,
  state: RepairState
): string {
  const parts = [
    path.basename(session.filePath),
    `attempt ${session.attempts}/${session.maxAttempts}`,
    state,
  ];
  if (session.originalCode) parts.push(`line ${session.errorLineNo}`);
  return parts.join(" | ");
}

function createPane(
  grid: contrib.grid,
  region: { row: number; rowSpan: number },
  label: string,
  border: string
): contrib.Widgets.LogElement {
  return grid.set(region.row, 0, region.rowSpan, 1, contrib.log, {
    label: ` ${label} `,
    bufferLength: 1000,
    scrollable: true,
    mouse: true,
    keys: true,
    scrollbar: true,
    style: { fg: "inherit", bg: "inherit", border: { fg: border } },
  });
}

export function createBlessedUI(): BlessedUI {
  let screen: blessed.Widgets.Screen | undefined;
  let statusBox: blessed.Widgets.BoxElement | undefined;
  let outputPane: contrib.Widgets.LogElement | undefined;
  let repairPane: contrib.Widgets.LogElement | undefined;

  function initialize() {
    if (screen || !process.stdin.isTTY || !process.stdout.isTTY) return;

    try {
      screen = blessed.screen({
        smartCSR: true,
        title: "linefix",
        fullUnicode: true,
        terminal: "xterm-256color",
      });

      const grid = new contrib.grid({ rows: 12, cols: 1, screen });
      statusBox = grid.set(LAYOUT.status.row, 0, LAYOUT.status.rowSpan, 1, blessed.box, {
        label: " Repair ",
        content: "waiting",
        tags: false,
        style: { fg: "white", border: { fg: "yellow" } },
      });
      outputPane = createPane(grid, LAYOUT.output, "Test Output", "cyan");
      repairPane = createPane(grid, LAYOUT.repair, "Repair Log", "green");

      screen.key(["escape", "q", "C-c"], () => {
        destroy();
        process.exit(130);
      });
    } catch (error) {
      screen = undefined;
      console.error("Failed to initialize UI:", error);
    }
  }

  function append(pane: contrib.Widgets.LogElement | undefined, text: string) {
    if (!pane) {
      process.stdout.write(text);
      return;
    }
    pane.setContent(pane.getContent() + filterCursorCodes(text));
    pane.scrollTo(pane.getScrollHeight());
    render();
  }

  function setStatus(text: string) {
    if (!statusBox) return;
    statusBox.setContent(text);
    render();
  }

  function render() {
    screen?.render();
  }

  function destroy() {
    if (!screen) return;
    try {
      screen.destroy();
      process.stdout.write("\x1B[0m\x1Bc");
    } catch (error) {
      console.error("Error cleaning up UI:", error);
    }
    screen = undefined;
    statusBox = undefined;
    outputPane = undefined;
    repairPane = undefined;
  }

  return {
    initialize,
    isActive: () => screen !== undefined,
    setStatus,
    appendOutputLog: (text) => append(outputPane, text),
    appendReasoningLog: (text) => append(repairPane, text),
    render,
    destroy,
  };
}

export const ui = createBlessedUI();

/**
 * Routes repair logging into the panes, or to stdout without a screen.
 * Harness output is only echoed to stdout in debug mode.
 */
export function createUiLogger(target: BlessedUI, debug: boolean): RepairLogger {
  return {
    output: (text) => {
      if (target.isActive() || debug) target.appendOutputLog(text);
    },
    info: (text) => target.appendReasoningLog(text),
    state: (session, state) => {
      target.setStatus(formatRepairStatus(session, state));
      target.appendReasoningLog(`[attempt ${session.attempts}] ${state}\n`);
    },
  };
}
