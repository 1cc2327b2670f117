/**
 * Observable state of a pipeline run
 */

export type RunStage =
  | "idle"
  | "connect"
  | "fetch"
  | "ingest"
  | "profile"
  | "score"
  | "select"
  | "deliver"
  | "done"
  | "error";

export interface RunStatusSnapshot {
  running: boolean;
  stage: RunStage;
  message: string;
  scored: number;
  total: number;
  startedAt: number | null;
  finishedAt: number | null;
}

export class RunStatus {
  private state: RunStatusSnapshot = {
    running: false,
    stage: "idle",
    message: "",
    scored: 0,
    total: 0,
    startedAt: null,
    finishedAt: null,
  };

  get running(): boolean {
    return this.state.running;
  }

  start(): void {
    this.state = {
      running: true,
      stage: "connect",
      message: "",
      scored: 0,
      total: 0,
      startedAt: Date.now(),
      finishedAt: null,
    };
  }

  update(changes: Partial<Omit<RunStatusSnapshot, "running" | "startedAt" | "finishedAt">>): void {
    this.state = { ...this.state, ...changes };
  }

  finish(stage: "done" | "error", message = ""): void {
    this.state = { ...this.state, running: false, stage, message, finishedAt: Date.now() };
  }

  /**
   * Copy of the current state; later updates do not affect it
   */
  snapshot(): RunStatusSnapshot {
    return { ...this.state };
  }
}
