export type KeyEventType = "down" | "up";

export interface KeyEvent {
  /** Raw key name as the hook reports it; consumers normalize. */
  name: string;
  type: KeyEventType;
}

export type KeyListener = (event: KeyEvent) => void;

/**
 * Global keyboard hook. Delivers every transition, auto-repeat downs
 * included; consumers drop repeats themselves.
 */
export interface KeyHook {
  hook(listener: KeyListener): () => void;
}

/** Tracks held keys so one physical press yields a single down. */
export class HeldKeys {
  private held = new Set<string>();

  /** True for the first down of a press. */
  accept(key: string, type: KeyEventType): boolean {
    if (type === "up") {
      this.held.delete(key);
      return false;
    }
    if (this.held.has(key)) {
      return false;
    }
    this.held.add(key);
    return true;
  }

  has(key: string): boolean {
    return this.held.has(key);
  }

  clear(): void {
    this.held.clear();
  }
}
