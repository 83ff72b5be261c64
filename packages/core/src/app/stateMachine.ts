/**
 * packages/core/src/app/stateMachine.ts — App lifecycle states.
 *
 *   Created --start--> Running --stop--> Stopped --start--> Running
 *                         \--fatal--> Faulted
 */

import { LoomError } from "../errors.js";

export type AppState = "Created" | "Running" | "Stopped" | "Faulted";

export class AppStateMachine {
  private current: AppState = "Created";

  get state(): AppState {
    return this.current;
  }

  assertOneOf(states: readonly AppState[], detail: string): void {
    if (!states.includes(this.current)) {
      throw new LoomError("LOOM_INVALID_STATE", `${detail} (state=${this.current})`);
    }
  }

  toRunning(): void {
    this.assertOneOf(["Created", "Stopped"], "cannot start");
    this.current = "Running";
  }

  toStopped(): void {
    this.assertOneOf(["Running"], "cannot stop");
    this.current = "Stopped";
  }

  toFaulted(): void {
    this.current = "Faulted";
  }
}
