export interface ChatTurn {
  question: string;
  answer: string;
}

/** Bounded turn log; the oldest turn drops out once the limit is reached. */
export class ChatHistory {
  private readonly entries: ChatTurn[];

  constructor(
    private readonly maxLength: number,
    turns: ChatTurn[] = [],
  ) {
    this.entries = turns.slice(-maxLength);
  }

  get length(): number {
    return this.entries.length;
  }

  append(question: string, answer: string): void {
    if (this.entries.length === this.maxLength) {
      this.entries.shift();
    }
    this.entries.push({ question, answer });
  }

  turns(): ChatTurn[] {
    return this.entries.map((turn) => ({ ...turn }));
  }

  lastAnswer(): string | null {
    return this.entries[this.entries.length - 1]?.answer ?? null;
  }

  clear(): void {
    this.entries.length = 0;
  }

  toString(): string {
    return this.entries.map((turn) => `question: ${turn.question}, answer: ${turn.answer}`).join('\n');
  }
}
