import * as fs from "fs";
import * as path from "path";
import { runStateSchema, type RestoreStage, type RunState } from "../../shared/schema";
import { formatBytes } from "./fs-utils";

// ---------------------------------------------------------------------------
// Byte progress
// ---------------------------------------------------------------------------

export interface ByteProgress {
  update(bytes: number): void;
  done(): void;
  readonly current: number;
}

/**
 * Logs in 10% steps when the total is known, and every 50 MB otherwise.
 */
export function createByteProgress(label: string, total: number | null, startAt = 0): ByteProgress {
  const UNKNOWN_TOTAL_STEP = 50 * 1024 * 1024;
  let current = startAt;
  let lastStep = total ? Math.floor((current / total) * 10) : Math.floor(current / UNKNOWN_TOTAL_STEP);

  return {
    get current() {
      return current;
    },
    update(bytes: number) {
      current += bytes;
      const step = total ? Math.floor((current / total) * 10) : Math.floor(current / UNKNOWN_TOTAL_STEP);
      if (step > lastStep) {
        lastStep = step;
        const pct = total ? ` (${Math.min(100, Math.round((current / total) * 100))}%)` : "";
        console.log(
          `  ${label}: ${formatBytes(current)}${total ? ` / ${formatBytes(total)}` : ""}${pct}`,
        );
      }
    },
    done() {
      console.log(`  ${label}: done, ${formatBytes(current)}`);
    },
  };
}

// ---------------------------------------------------------------------------
// Run state
// ---------------------------------------------------------------------------

export function loadRunState(filePath: string): RunState | null {
  if (!fs.existsSync(filePath)) return null;
  try {
    const parsed = runStateSchema.safeParse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function saveRunState(filePath: string, state: RunState): void {
  state.lastUpdated = new Date().toISOString();
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(state, null, 2));
}

export function updateRunState(
  filePath: string,
  state: RunState,
  patch: Partial<RunState> & { stage: RestoreStage },
): RunState {
  Object.assign(state, patch);
  saveRunState(filePath, state);
  return state;
}
