// src/services/memory.ts
// Short-term dialogue memory: the last few turns of the current session

import type { Role } from '../locales/types.js';

export interface Turn {
  readonly role: Role;
  readonly text: string;
  readonly timestamp: Date;
}

export interface DialogueMemoryOptions {
  /** Maximum stored turns; the oldest is evicted first */
  capacity?: number;
  /** Maximum user/assistant pairs rendered into prompt context */
  contextPairs?: number;
  /** Line prefixes used by renderContext() */
  roleLabels?: Record<Role, string>;
}

const DEFAULT_CAPACITY = 5;
const DEFAULT_CONTEXT_PAIRS = 3;
const DEFAULT_LABELS: Record<Role, string> = { user: 'User', assistant: 'Assistant' };

/**
 * Fixed-capacity ring buffer of turns. One instance per session; a single
 * caller records and reads, so there is no locking.
 */
export class DialogueMemory {
  private slots: Array<Turn | undefined>;
  private head = 0;
  private count = 0;
  private contextPairs: number;
  private roleLabels: Record<Role, string>;

  constructor(options: DialogueMemoryOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Dialogue memory capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<Turn | undefined>(capacity).fill(undefined);
    this.contextPairs = options.contextPairs ?? DEFAULT_CONTEXT_PAIRS;
    this.roleLabels = options.roleLabels ?? DEFAULT_LABELS;
  }

  get capacity(): number {
    return this.slots.length;
  }

  get size(): number {
    return this.count;
  }

  record(role: Role, text: string): Turn {
    const turn: Turn = Object.freeze({ role, text, timestamp: new Date() });
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = turn;

    if (this.count < this.capacity) {
      this.count++;
    } else {
      // Buffer was full: the write above replaced the oldest turn
      this.head = (this.head + 1) % this.capacity;
    }

    return turn;
  }

  /** Stored turns, oldest first */
  turns(): Turn[] {
    const result: Turn[] = [];
    for (let i = 0; i < this.count; i++) {
      const turn = this.slots[(this.head + i) % this.capacity];
      if (turn) result.push(turn);
    }
    return result;
  }

  /**
   * Render the most recent user turns, each followed by the assistant reply
   * stored right after it, as "Label: text" lines in chronological order.
   */
  renderContext(): string {
    const turns = this.turns();
    const pairs: Turn[][] = [];

    for (let i = turns.length - 1; i >= 0 && pairs.length < this.contextPairs; i--) {
      if (turns[i].role !== 'user') continue;

      const pair = [turns[i]];
      const reply = turns[i + 1];
      if (reply && reply.role === 'assistant') pair.push(reply);
      pairs.push(pair);
    }

    return pairs
      .reverse()
      .flat()
      .map((turn) => `${this.roleLabels[turn.role]}: ${turn.text}`)
      .join('\n');
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
