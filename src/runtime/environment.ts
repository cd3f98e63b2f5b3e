/**
 * Variable bindings for one script run.
 * Indy has a single flat scope and a single value kind: strings.
 */
export class Environment {
  private bindings: Map<string, string> = new Map();

  /** Undefined names read as an empty string rather than failing. */
  get(name: string): string {
    return this.bindings.get(name) ?? '';
  }

  set(name: string, value: string): void {
    this.bindings.set(name, value);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  /**
   * Copy of every binding, in assignment order.
   */
  snapshot(): Record<string, string> {
    return Object.fromEntries(this.bindings);
  }
}
