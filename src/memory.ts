import type { ConversationTurn } from "./types";

/** Bounded FIFO log of the most recent conversation turns for one session. */
export class ConversationMemory {
  public readonly windowSize: number;
  private turns: ConversationTurn[] = [];

  public constructor(windowSize = 5) {
    this.windowSize = Math.max(1, Math.floor(windowSize));
  }

  public get size(): number {
    return this.turns.length;
  }

  /** Add a turn, evicting the oldest ones past the window. */
  public append(turn: ConversationTurn): void {
    this.turns = [...this.turns, turn].slice(-this.windowSize);
  }

  public snapshot(): readonly ConversationTurn[] {
    return Object.freeze([...this.turns]);
  }

  public clear(): void {
    this.turns = [];
  }

  /** Replace the log with the newest `windowSize` of `turns` (oldest first). */
  public restore(turns: readonly ConversationTurn[]): void {
    this.turns = turns.slice(-this.windowSize);
  }
}
