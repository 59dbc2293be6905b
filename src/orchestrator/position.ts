/** JSON-pointer address of a task inside the tree, e.g. `/do/1/nested/do/0/step2a`. */
export class TaskPosition {
  private constructor(private readonly tokens: readonly string[]) {}

  static root(): TaskPosition {
    return new TaskPosition([]);
  }

  child(...tokens: ReadonlyArray<string | number>): TaskPosition {
    return new TaskPosition([...this.tokens, ...tokens.map(String)]);
  }

  /** Last token; for list entries this is the task name. */
  get name(): string {
    return this.tokens[this.tokens.length - 1] ?? "";
  }

  get pointer(): string {
    return this.tokens.map(t => `/${t.replace(/~/g, "~0").replace(/\//g, "~1")}`).join("");
  }

  toString(): string {
    return this.pointer || "/";
  }
}
